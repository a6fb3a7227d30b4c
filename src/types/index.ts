/**
 * Vault Headings - Type Definitions
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Outcome of processing a single Markdown file
export interface FileRecord {
  readonly filePath: string; // Absolute path
  readonly replacements: number;
  readonly modified: boolean; // True only when the file was rewritten on disk
  readonly error?: string;
}

// Aggregate of one conversion run
export interface RunSummary {
  readonly filesScanned: number;
  readonly filesChanged: number; // Files with at least one H1 (would-be changes in dry run)
  readonly totalReplacements: number;
  readonly errors: readonly string[]; // "<path>: <message>"
}

// Fence marker families recognised by the heading scanner
export type FenceMarker = '```' | '~~~';

// Line scanner state: exactly one is active at a time
export type ScanState =
  | { kind: 'normal' }
  | { kind: 'frontmatter' }
  | { kind: 'fenced'; marker: FenceMarker };

export interface ConversionOutput {
  content: string;
  replacements: number;
}

// Text encodings tried, in order, when reading a file
export type TextEncodingName = 'utf-8' | 'utf-8-sig' | 'latin-1';

export interface DecodedText {
  content: string;
  encoding: TextEncodingName;
}

// Fully resolved options for one run
export interface RunOptions {
  readonly rootPath: string; // Absolute, validated directory
  readonly dryRun: boolean;
  readonly createBackups: boolean;
  readonly verbose: boolean;
  readonly extraExcludes: ReadonlySet<string>;
  readonly extension: string;
  readonly backupDirName: string;
  readonly logLevel: LogLevel;
}

// Sink for report lines (stdout in the CLI, an array in tests)
export type OutputFn = (line: string) => void;
