import React from 'react';
import type { DashboardWarning } from '../services/errors';

const ViewNotice: React.FC<{ warning: DashboardWarning }> = ({ warning }) => (
  <div
    role="status"
    className="h-64 flex items-center justify-center text-center px-6 text-slate-400 font-black uppercase tracking-widest text-xs border-2 border-dashed border-slate-200 rounded-2xl"
  >
    {warning.message}
  </div>
);

export default ViewNotice;
