/**
 * Fatal input problem: a required column is missing or a row cannot be
 * normalized. Aborts the data view; filtering cannot recover from it.
 */
export class SchemaError extends Error {
  readonly missingColumns: string[];
  readonly row?: number;

  constructor(message: string, details: { missingColumns?: string[]; row?: number } = {}) {
    super(message);
    this.name = 'SchemaError';
    this.missingColumns = details.missingColumns ?? [];
    this.row = details.row;
  }
}

export interface EmptySelectionWarning {
  kind: 'EmptySelection';
  view: string;
  message: string;
}

export interface MissingOptionalColumnWarning {
  kind: 'MissingOptionalColumn';
  view: string;
  column: string;
  message: string;
}

export type DashboardWarning = EmptySelectionWarning | MissingOptionalColumnWarning;

export type ViewResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'empty'; warning: EmptySelectionWarning }
  | { status: 'skipped'; warning: MissingOptionalColumnWarning };

export function emptySelection(view: string, message = 'Please make a selection to see this view.'): EmptySelectionWarning {
  return { kind: 'EmptySelection', view, message };
}

export function missingColumn(view: string, column: string): MissingOptionalColumnWarning {
  return {
    kind: 'MissingOptionalColumn',
    view,
    column,
    message: `Column ${column} is not present in this dataset.`
  };
}

export function ok<T>(value: T): ViewResult<T> {
  return { status: 'ok', value };
}
