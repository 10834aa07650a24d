export type ToolName = 'query_surveillance_db' | 'search_news_context';

export type SessionPhase = 'PLANNING' | 'EXECUTING_TOOL' | 'FINALIZING' | 'DONE' | 'FAILED';

export type ObservationErrorKind =
  | 'validation'
  | 'provider'
  | 'timeout'
  | 'schema_violation'
  | 'execution';

export interface ObservationError {
  kind: ObservationErrorKind;
  message: string;
}

export type CellValue = string | number | null;

export interface ResultColumn {
  name: string;
  type: 'text' | 'integer' | 'real' | 'date';
}

export interface AnalyticQueryResult {
  kind: 'analytic_query';
  question: string;
  sql: string;
  /** Values bound to the `?` placeholders of `sql`, in order. */
  params: Array<string | number>;
  columns: ResultColumn[];
  rows: CellValue[][];
  rowCount: number;
  truncated: boolean;
  truncation?: {
    reason: 'rows' | 'bytes';
    maxRows: number;
    maxBytes: number;
    omittedRows?: number;
  };
}

export interface PassageScores {
  semantic: number | null;
  lexical: number;
  semanticRank: number | null;
  lexicalRank: number;
  fused: number;
}

export interface RetrievedPassage {
  id: string;
  documentId: string;
  title: string;
  url: string;
  fetchedAt: string;
  text: string;
  rank: number;
  scores: PassageScores;
}

export interface NewsRetrievalResult {
  kind: 'news_retrieval';
  topic: string;
  recencyDays?: number;
  candidateCount: number;
  passageCount: number;
  empty: boolean;
  degraded: Array<'semantic'>;
  passages: RetrievedPassage[];
}

export type ToolPayload = AnalyticQueryResult | NewsRetrievalResult;

interface ObservationBase {
  id: string;
  source: string;
  callId?: string;
  arguments: Record<string, unknown>;
  timestamp: string;
  durationMs: number;
}

export interface SuccessObservation extends ObservationBase {
  ok: true;
  payload: ToolPayload;
}

export interface FailureObservation extends ObservationBase {
  ok: false;
  error: ObservationError;
}

export type Observation = SuccessObservation | FailureObservation;

export type TrendDirection = 'rising' | 'falling' | 'stable' | 'unknown';

export type MetricName =
  | 'case_growth_rate'
  | 'mortality_rate'
  | 'icu_occupancy_rate'
  | 'vaccination_rate';

export interface ReportMetric {
  name: MetricName;
  value: string | null;
  citations: string[];
}

export interface ReportClaim {
  statement: string;
  figures: string[];
  citations: string[];
  supported: boolean;
}

export interface StructuredReport {
  title: string;
  executiveSummary: string;
  situation: { trend: TrendDirection; explanation: string };
  metrics: ReportMetric[];
  recentContext: string;
  interpretation: string;
  limitations: string;
  recommendations: string;
  claims: ReportClaim[];
}

export interface CompleteReport {
  status: 'complete';
  completeness: 'complete' | 'partial';
  notices: string[];
  report: StructuredReport;
  markdown: string;
  droppedCitations: string[];
}

export interface DegradedReport {
  status: 'degraded';
  completeness: 'partial';
  notices: string[];
  rawText: string;
  trail: Observation[];
}

export type SessionReport = CompleteReport | DegradedReport;

export type SessionFailureKind = 'malformed_output' | 'provider_outage' | 'cancelled' | 'synthesis_failed';

export interface SessionResult {
  sessionId: string;
  status: 'DONE' | 'FAILED';
  phases: SessionPhase[];
  iterations: number;
  iterationLimitReached: boolean;
  dataDate: string | null;
  observations: Observation[];
  report?: SessionReport;
  error?: { kind: SessionFailureKind; message: string };
}

export interface ReportRequestPayload {
  question?: string;
  locale?: string;
  sessionId?: string;
}

export interface DailyCount {
  date: string;
  cases: number;
}

export interface MonthlyCount {
  month: string;
  cases: number;
}

export interface StoreMetadataResponse {
  latestDataDate: string | null;
  tables: Array<{ name: string; description: string; columns: string[] }>;
}
