export type RawCell = string | null;

export type RawTable = RawCell[][];

export type CellValue = string | number;

export interface NormalizedRecord {
  offense_type: string;
  [field: string]: CellValue;
}

export interface CrimeReportSummary {
  total_offense_types: number;
  violent_crimes: string[];
  property_crimes: string[];
  violent_crime_count: number;
  property_crime_count: number;
}

export interface ParseResult {
  readonly report_date: string | null;
  readonly extracted_date_text: string | null;
  readonly download_timestamp: string;
  readonly source_file: string;
  readonly crime_statistics: readonly NormalizedRecord[];
  readonly summary: Readonly<CrimeReportSummary>;
  readonly parse_errors: readonly string[];
}

export interface ReportPage {
  pageNumber: number;
  text: string;
  tables: RawTable[];
}

export interface ReportDocument {
  sourceFile: string;
  pages: ReportPage[];
  close(): Promise<void>;
}

export interface DocumentSource {
  open(): Promise<ReportDocument>;
}

export type PipelineStage =
  | 'START'
  | 'DATE_EXTRACTED'
  | 'TABLES_PROCESSED'
  | 'SUMMARY_COMPUTED'
  | 'DONE';

export interface PipelineProgress {
  stage: PipelineStage;
  message: string;
  totalPages?: number;
}

export interface PipelineOptions {
  now?: () => Date;
  sourceFile?: string;
  onProgress?: (progress: PipelineProgress) => void;
  onWarning?: (message: string) => void;
  onError?: (message: string, stage: PipelineStage) => void;
}

export interface PositionedTextItem {
  str: string;
  x: number;
  y: number;
  width: number;
  height: number;
  page: number;
}

export interface PageLine {
  y: number;
  items: PositionedTextItem[];
  text: string;
  page: number;
}

export interface LayoutCell {
  text: string;
  x0: number;
  x1: number;
}

export interface PageTableRow {
  cells: LayoutCell[];
  rowText: string;
  y: number;
  page: number;
}

export interface ReconstructedTable {
  page: number;
  titleRow: PageTableRow | null;
  headerRow: PageTableRow;
  dataRows: PageTableRow[];
  rows: RawTable;
}
