/**
 * Dialog Set
 *
 * Indexes dialogs by id, including every inline child reachable through
 * triggers and container actions, so begin_dialog references and the
 * context stack can resolve any dialog of the tree.
 */

import { DuplicateDialogIdError, UnsupportedDialogKindError, describeKind } from "../errors.js";
import type { Dialog, DialogContext } from "./types.js";

/**
 * Inline children of a dialog. References (begin_dialog) are not followed.
 */
export function childDialogs(dialog: Dialog): Dialog[] {
  switch (dialog.kind) {
    case 'adaptive':
      return dialog.triggers.flatMap((trigger) => trigger.actions);
    case 'if_condition':
      return [...dialog.actions, ...(dialog.elseActions ?? [])];
    case 'switch_condition':
      return [...dialog.cases.flatMap((c) => c.actions), ...(dialog.default ?? [])];
    case 'foreach':
      return dialog.actions;
    case 'number_input':
    case 'confirm_input':
    case 'text_input':
    case 'attachment_input':
    case 'date_time_input':
    case 'choice_input':
    case 'send_activity':
    case 'ask':
    case 'end_dialog':
    case 'set_property':
    case 'begin_dialog':
      return [];
    default:
      throw new UnsupportedDialogKindError(describeKind(dialog));
  }
}

export class DialogSet {
  private readonly dialogs = new Map<string, Dialog>();

  constructor(dialogs: Iterable<Dialog> = []) {
    for (const dialog of dialogs) {
      this.add(dialog);
    }
  }

  /**
   * Register a dialog and its inline descendants. Re-adding the same
   * object is a no-op; a different dialog under a taken id is rejected.
   */
  add(dialog: Dialog): this {
    const existing = this.dialogs.get(dialog.id);
    if (existing === dialog) {
      return this;
    }
    if (existing) {
      throw new DuplicateDialogIdError(dialog.id);
    }
    this.dialogs.set(dialog.id, dialog);
    for (const child of childDialogs(dialog)) {
      this.add(child);
    }
    return this;
  }

  find(id: string): Dialog | undefined {
    return this.dialogs.get(id);
  }

  has(id: string): boolean {
    return this.dialogs.has(id);
  }

  get size(): number {
    return this.dialogs.size;
  }

  ids(): string[] {
    return [...this.dialogs.keys()];
  }
}

export function createDialogContext(dialogs: DialogSet, locale: string): DialogContext {
  return {
    locale,
    findDialog: (id) => dialogs.find(id),
  };
}
