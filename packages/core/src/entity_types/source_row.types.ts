/**
 * Column names of a ShotGrid task export.
 */
export const SOURCE_COLUMNS = {
  id: 'Id',
  taskName: 'Task Name',
  link: 'Link',
  pipelineStep: 'Pipeline Step',
  status: 'Status',
  assignedTo: 'Assigned To',
  reviewer: 'Reviewer',
  startDate: 'Start Date',
  dueDate: 'Due Date',
  shotStatus: 'Shot > Shot Status',
  project: 'Project',
  thumbnail: 'Thumbnail',
} as const;

export type SourceColumnKey = keyof typeof SOURCE_COLUMNS;
export type SourceColumnName = (typeof SOURCE_COLUMNS)[SourceColumnKey];

/**
 * A row exactly as the row source produced it: column name to cell text.
 * Columns outside the export layout are carried but ignored.
 */
export type RawRow = Readonly<Record<string, string | undefined>>;

/**
 * One normalized task record. Absent fields are `undefined`, never `''`.
 */
export type SourceRow = {
  readonly id: number;
  readonly taskName?: string;
  readonly link?: string;
  readonly pipelineStep?: string;
  readonly status?: string;
  readonly assignedTo?: string;
  readonly reviewer?: string;
  readonly startDate?: string;
  readonly dueDate?: string;
  readonly shotStatus?: string;
  readonly project?: string;
  readonly thumbnail?: string;
};
