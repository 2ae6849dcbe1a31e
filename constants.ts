
import type { AnalysisSettings } from './types';

export const DEFAULT_SETTINGS: AnalysisSettings = {
  covidThresholdYear: 2020,
  iqrMultiplier: 1.5,
  significanceLevel: 0.05
};

export const REQUIRED_COLUMNS = [
  'StudentID',
  'RegistrationYear',
  'BirthYear',
  'Gender',
  'Origin',
  'Department',
  'Major',
  'Semester',
  'Credits',
  'Grade'
] as const;

export const MAJOR_TYPE_COLUMN = 'Major_Type';

export const PLACEHOLDER = 'N/A';

// Small built-in sample so the dashboard has something to show before an upload.
export const DEMO_SOURCE_KEY = 'demo';

export const DEMO_CSV = `StudentID,RegistrationYear,BirthYear,Gender,Origin,Department,Major_Type,Major,Semester,Credits,Grade
1001,2017,1999,F,Domestic,Computer Science,Bachelor,Software Engineering,20181,6,7.5
1001,2017,1999,F,Domestic,Computer Science,Bachelor,Software Engineering,20182,6,7.8
1001,2017,1999,F,Domestic,Computer Science,Bachelor,Software Engineering,20191,5,8.1
1002,2018,2000,M,International,Computer Science,Bachelor,Data Science,20182,6,6.9
1002,2018,2000,M,International,Computer Science,Bachelor,Data Science,20192,6,7.2
1002,2018,2000,M,International,Computer Science,Bachelor,Data Science,20201,6,8.0
1003,2019,1997,M,Domestic,Economics,Master,Econometrics,20191,7.5,7.0
1003,2019,1997,M,Domestic,Economics,Master,Econometrics,20201,7.5,8.4
1003,2019,1997,M,Domestic,Economics,Master,Econometrics,20202,7.5,8.6
1004,2019,2001,F,Domestic,Economics,Bachelor,Finance,20192,5,6.5
1004,2019,2001,F,Domestic,Economics,Bachelor,Finance,20211,5,7.9
1004,2019,2001,F,Domestic,Economics,Bachelor,Finance,20212,5,8.2
1005,2020,2002,F,International,History,Bachelor,Modern History,20201,6,7.1
1005,2020,2002,F,International,History,Bachelor,Modern History,20211,6,7.7
1005,2020,2002,F,International,History,Bachelor,Modern History,20221,6,8.3
1006,2020,1996,M,Domestic,History,Master,Archival Studies,20202,10,8.0
1006,2020,1996,M,Domestic,History,Master,Archival Studies,20212,10,8.8
1007,2021,2003,X,Domestic,Computer Science,Bachelor,Software Engineering,20212,6,8.5
1007,2021,2003,X,Domestic,Computer Science,Bachelor,Software Engineering,20221,6,9.1
1008,2021,1998,F,International,Economics,Master,Econometrics,20221,7.5,4.0
`;
