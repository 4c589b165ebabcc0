export type NoteTreeErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_NAME'
  | 'CYCLE'
  | 'ORIGINAL_PARENT_GONE'
  | 'INDEX_OUT_OF_RANGE'
  | 'IO_ERROR'
  | 'PARSE_ERROR'
  | 'INVALID_NAME'
  | 'INVALID_OPERATION'
  | 'DECRYPTION_FAILED';

export class NoteTreeError extends Error {
  constructor(
    message: string,
    public readonly code: NoteTreeErrorCode
  ) {
    super(message);
    this.name = 'NoteTreeError';
  }
}

export class NotFoundError extends NoteTreeError {
  constructor(entity: string, ref: number | string) {
    super(`${entity} not found: ${ref}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class DuplicateNameError extends NoteTreeError {
  constructor(entity: string, name: string) {
    super(`${entity} named '${name}' already exists`, 'DUPLICATE_NAME');
    this.name = 'DuplicateNameError';
  }
}

export class CycleError extends NoteTreeError {
  constructor(folderId: number, targetId: number) {
    super(`Cannot move folder ${folderId} into ${targetId}: target is the folder itself or one of its descendants`, 'CYCLE');
    this.name = 'CycleError';
  }
}

export class OriginalParentGoneError extends NoteTreeError {
  constructor(parentId: number | null) {
    super(`Original parent folder ${parentId ?? '(none)'} is no longer available`, 'ORIGINAL_PARENT_GONE');
    this.name = 'OriginalParentGoneError';
  }
}

export class IndexOutOfRangeError extends NoteTreeError {
  constructor(index: number, length: number) {
    super(`Index ${index} is out of range (length ${length})`, 'INDEX_OUT_OF_RANGE');
    this.name = 'IndexOutOfRangeError';
  }
}

export class IOError extends NoteTreeError {
  constructor(operation: string, filePath: string, cause: string) {
    super(`Failed to ${operation} '${filePath}': ${cause}`, 'IO_ERROR');
    this.name = 'IOError';
  }
}

export class ParseError extends NoteTreeError {
  constructor(filePath: string, cause: string) {
    super(`Failed to parse '${filePath}': ${cause}`, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class InvalidNameError extends NoteTreeError {
  constructor(name: string, reason: string) {
    super(`Invalid name '${name}': ${reason}`, 'INVALID_NAME');
    this.name = 'InvalidNameError';
  }
}

export class InvalidOperationError extends NoteTreeError {
  constructor(message: string) {
    super(message, 'INVALID_OPERATION');
    this.name = 'InvalidOperationError';
  }
}

export class DecryptionError extends NoteTreeError {
  constructor(noteId: number) {
    super(`Could not decrypt note ${noteId}: wrong passphrase or corrupted content`, 'DECRYPTION_FAILED');
    this.name = 'DecryptionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
