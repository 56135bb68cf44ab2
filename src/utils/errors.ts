export class NotesLedgerError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'NotesLedgerError';
  }
}

export class ConfigurationError extends NotesLedgerError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the store cannot complete a read or a transaction.
 * Writes that raise this have been rolled back in full.
 */
export class DatabaseError extends NotesLedgerError {
  constructor(message: string) {
    super(message, 'DATABASE_ERROR');
    this.name = 'DatabaseError';
  }
}

export class ApiError extends NotesLedgerError {
  constructor(message: string, public provider?: string) {
    super(message, 'API_ERROR');
    this.name = 'ApiError';
  }
}

export class ValidationError extends NotesLedgerError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class FileError extends NotesLedgerError {
  constructor(message: string) {
    super(message, 'FILE_ERROR');
    this.name = 'FileError';
  }
}

export class UnsupportedExportFormatError extends NotesLedgerError {
  constructor(public format: string) {
    super(`Unsupported export format "${format}". Use "csv" or "json".`, 'UNSUPPORTED_EXPORT_FORMAT');
    this.name = 'UnsupportedExportFormatError';
  }
}
