export type Severity = 'error' | 'warning' | 'info';

export const SEVERITIES: readonly Severity[] = ['error', 'warning', 'info'];

export type TabularFileType = 'tabular-tall' | 'tabular-wide' | 'tabular-generic';

export type StructuredFileType =
  | 'structured-negotiated-rates'
  | 'structured-allowed-amounts'
  | 'structured-provider-reference'
  | 'structured-unknown';

export type FileType = TabularFileType | StructuredFileType | 'unknown';

export interface Finding {
  readonly severity: Severity;
  /** Stable rule code, e.g. "coding.present". */
  readonly rule: string;
  readonly message: string;
  readonly expected: string | null;
  readonly actual: string | null;
  /** Raw or canonical header, or a `$`-rooted document path. */
  readonly field: string | null;
  /** Number of source rows this finding summarizes. */
  readonly count: number;
}

export interface SeverityCounts {
  readonly errors: number;
  readonly warnings: number;
  readonly info: number;
}

export interface ValidationResult {
  readonly ok: boolean;
  readonly file_type: FileType;
  readonly counts: SeverityCounts;
  readonly findings: readonly Finding[];
  readonly metadata: Readonly<Record<string, unknown>>;
}
