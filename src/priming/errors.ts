/**
 * Priming error taxonomy
 *
 * Every failure the providers or the context stack raise extends
 * PrimingError and carries a stable `code` for programmatic handling.
 * None of these are caught inside src/priming; they surface to the
 * calling dialog engine (or the HTTP error handler).
 */

export type PrimingErrorCode =
  | 'STACK_MISMATCH'
  | 'UNSUPPORTED_RECOGNIZER_KIND'
  | 'UNSUPPORTED_DIALOG_KIND'
  | 'SCHEMA_BINDING_MISSING'
  | 'DIALOG_NOT_FOUND'
  | 'DUPLICATE_DIALOG_ID';

export abstract class PrimingError extends Error {
  abstract readonly code: PrimingErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * A dialog ended (or declared properties) while another dialog was on top.
 */
export class StackMismatchError extends PrimingError {
  readonly code = 'STACK_MISMATCH';

  constructor(
    public readonly dialogId: string,
    public readonly topDialogId: string | null,
  ) {
    super(
      topDialogId === null
        ? `Dialog "${dialogId}" is not active: the priming stack is empty`
        : `Dialog "${dialogId}" is not the active dialog (top is "${topDialogId}")`,
    );
  }
}

export class UnsupportedRecognizerKindError extends PrimingError {
  readonly code = 'UNSUPPORTED_RECOGNIZER_KIND';

  constructor(public readonly kind: string) {
    super(`No priming provider registered for recognizer kind "${kind}"`);
  }
}

export class UnsupportedDialogKindError extends PrimingError {
  readonly code = 'UNSUPPORTED_DIALOG_KIND';

  constructor(public readonly kind: string) {
    super(`No priming provider registered for dialog kind "${kind}"`);
  }
}

/**
 * An expected property has no entry in the dialog's schema.
 */
export class SchemaBindingMissingError extends PrimingError {
  readonly code = 'SCHEMA_BINDING_MISSING';

  constructor(
    public readonly dialogId: string,
    public readonly property: string,
  ) {
    super(`Dialog "${dialogId}" expects property "${property}" but its schema does not declare it`);
  }
}

/**
 * A begin_dialog action references a dialog that is not in the dialog set.
 */
export class DialogNotFoundError extends PrimingError {
  readonly code = 'DIALOG_NOT_FOUND';

  constructor(public readonly dialogId: string) {
    super(`Dialog "${dialogId}" is not registered in the dialog set`);
  }
}

export class DuplicateDialogIdError extends PrimingError {
  readonly code = 'DUPLICATE_DIALOG_ID';

  constructor(public readonly dialogId: string) {
    super(`Two different dialogs share the id "${dialogId}"`);
  }
}

export function isPrimingError(error: unknown): error is PrimingError {
  return error instanceof PrimingError;
}

/**
 * Read the `kind` tag off a value that fell through a closed dispatch.
 */
export function describeKind(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return typeof value;
}
