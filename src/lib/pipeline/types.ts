export type Grammar = 'single-path' | 'dual-path';

export type Machine = 'Baselight' | 'Flame';

export type WorkOrder = {
  readonly producer: string;
  readonly operator: string;
  readonly job: string;
  readonly notes: string;
  /** Document order matters: reconciliation takes the first path that matches. */
  readonly canonicalPaths: readonly string[];
};

export type ParsedLine = {
  reviewedPath: string;
  rawFrameTokens: string[];
};

export type Sentinel = 'err' | 'null' | 'empty';

export type FrameToken =
  | { kind: 'frame'; value: number }
  | { kind: 'sentinel'; sentinel: Sentinel };

export type FrameRange = {
  start: number;
  end: number;
};

export type ReconciledRecord = {
  canonicalPath: string;
  frameRange: FrameRange;
};

export type RecordSink = (record: ReconciledRecord) => void;

export type MalformedLinePolicy = 'skip' | 'throw';

export type MalformedLine = {
  lineNumber: number;
  line: string;
  message: string;
};

export type ReconcileSummary = {
  lines: number;
  reconciled: number;
  unreconciled: number;
  malformed: MalformedLine[];
  records: number;
};

export type ExportFileIdentity = {
  machine: Machine;
  userOnFile: string;
  fileDate: Date;
  grammar: Grammar;
};
