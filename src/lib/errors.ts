export type ReconcileErrorCode =
  | 'WORK_ORDER_FIELD_MISSING'
  | 'MALFORMED_EXPORT_LINE'
  | 'TIMECODE_OUT_OF_RANGE'
  | 'EXPORT_FILE_NAME_INVALID'
  | 'CONFIG_INVALID';

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;

  constructor(code: ReconcileErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class WorkOrderError extends ReconcileError {
  readonly field: string;

  constructor(field: string) {
    super('WORK_ORDER_FIELD_MISSING', `No ${field} found in the work order`);
    this.field = field;
  }
}

export class MalformedLineError extends ReconcileError {
  readonly line: string;

  constructor(line: string, message: string) {
    super('MALFORMED_EXPORT_LINE', message);
    this.line = line;
  }
}

export class TimecodeRangeError extends ReconcileError {
  constructor(message: string) {
    super('TIMECODE_OUT_OF_RANGE', message);
  }
}

export class ExportFileNameError extends ReconcileError {
  readonly fileName: string;

  constructor(fileName: string, message: string) {
    super('EXPORT_FILE_NAME_INVALID', `${fileName}: ${message}`);
    this.fileName = fileName;
  }
}

export class ConfigError extends ReconcileError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
