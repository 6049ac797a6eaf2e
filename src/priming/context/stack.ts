/**
 * Priming Context Stack
 *
 * Turn-scoped LIFO of priming frames, one per begun-but-not-ended dialog.
 * The engine drives it with explicit begin/end calls; the top frame is
 * what the voice channel primes for.
 *
 * Every mutation is synchronous, so a push is visible before any nested
 * dialog begins and a pop happens before control returns to the parent.
 */

import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { describeDialog } from "../dialogs/describe.js";
import { narrowToProperties } from "../dialogs/schema.js";
import type { Dialog, DialogContext, DialogSchema } from "../dialogs/types.js";
import { StackMismatchError } from "../errors.js";
import { EMPTY_AGGREGATE } from "../merge.js";
import type { InputContext, PrimingAggregate } from "../types.js";

export interface ContextFrame {
  readonly dialogId: string;
  readonly locale: string;
  /** Everything reachable (narrowed once properties are declared) */
  readonly possible: PrimingAggregate;
  /** What is being asked for right now */
  readonly expected: PrimingAggregate;
  /** Begin-time description, before any narrowing */
  readonly described: PrimingAggregate;
  readonly schema?: DialogSchema;
}

export interface DialogRef {
  readonly id: string;
}

export interface BeginOptions {
  /** Overrides the ambient locale for this dialog and its children */
  locale?: string;
}

export interface PrimingContextStackOptions {
  /** Locale used when no frame is active */
  baseLocale: string;
  /** Cache describeDialog() results per dialog context, dialog and locale for the stack's lifetime */
  memoize?: boolean;
}

export class PrimingContextStack {
  readonly baseLocale: string;
  private readonly frames: ContextFrame[] = [];
  private readonly descriptions: WeakMap<DialogContext, WeakMap<Dialog, Map<string, PrimingAggregate>>> | null;

  constructor(options: PrimingContextStackOptions) {
    this.baseLocale = options.baseLocale;
    this.descriptions = options.memoize ? new WeakMap() : null;
  }

  get depth(): number {
    return this.frames.length;
  }

  get top(): ContextFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  /** Top frame's locale, else the base locale */
  get locale(): string {
    return this.top?.locale ?? this.baseLocale;
  }

  /** Frames bottom to top */
  snapshot(): readonly ContextFrame[] {
    return Object.freeze([...this.frames]);
  }

  getInputContext(): InputContext {
    const top = this.top;
    if (!top) {
      return Object.freeze({ locale: this.baseLocale, possible: EMPTY_AGGREGATE, expected: EMPTY_AGGREGATE });
    }
    return Object.freeze({ locale: top.locale, possible: top.possible, expected: top.expected });
  }

  onDialogBegin(dialog: Dialog, dialogContext: DialogContext, options: BeginOptions = {}): ContextFrame {
    const locale = options.locale ?? this.locale;
    const described = this.describe(dialog, dialogContext, locale);

    const frame: ContextFrame = Object.freeze({
      dialogId: dialog.id,
      locale,
      possible: described,
      expected: described,
      described,
      ...(dialog.kind === 'adaptive' && dialog.schema ? { schema: dialog.schema } : {}),
    });
    this.frames.push(frame);

    log.debug(
      {
        dialog_id: dialog.id,
        dialog_kind: dialog.kind,
        locale,
        depth: this.frames.length,
        entity_count: described.entities.length,
        intent_count: described.intents.length,
      },
      "Priming frame pushed",
    );
    return frame;
  }

  /**
   * Recompute the top frame for the properties its dialog is asking for.
   * Without a schema the begin-time description stays in place; an empty
   * property list restores it.
   */
  onExpectedPropertiesDeclared(dialog: DialogRef, properties: readonly string[]): ContextFrame {
    const top = this.requireTop(dialog);

    let narrowed = top.described;
    if (top.schema && properties.length > 0) {
      narrowed = narrowToProperties(top.dialogId, top.schema, properties, top.described);
    }

    const frame: ContextFrame = Object.freeze({ ...top, possible: narrowed, expected: narrowed });
    this.frames[this.frames.length - 1] = frame;

    log.debug(
      {
        dialog_id: dialog.id,
        properties: [...properties],
        schema_bound: Boolean(top.schema),
        entity_count: narrowed.entities.length,
      },
      "Priming frame narrowed to expected properties",
    );
    return frame;
  }

  onDialogEnd(dialog: DialogRef): ContextFrame {
    const popped = this.requireTop(dialog);
    this.frames.pop();

    log.debug({ dialog_id: dialog.id, depth: this.frames.length }, "Priming frame popped");
    return popped;
  }

  /**
   * Drop every frame (turn cancellation). Returns how many were dropped.
   */
  unwind(): number {
    const dropped = this.frames.length;
    this.frames.length = 0;
    if (dropped > 0) {
      emit(TelemetryEvents.StackUnwound, { frames: dropped });
    }
    return dropped;
  }

  private requireTop(dialog: DialogRef): ContextFrame {
    const top = this.top;
    if (!top || top.dialogId !== dialog.id) {
      const topId = top?.dialogId ?? null;
      emit(TelemetryEvents.StackMismatch, { dialog_id: dialog.id, top_dialog_id: topId, depth: this.frames.length });
      throw new StackMismatchError(dialog.id, topId);
    }
    return top;
  }

  private describe(dialog: Dialog, dialogContext: DialogContext, locale: string): PrimingAggregate {
    if (!this.descriptions) {
      return describeDialog(dialog, dialogContext, locale);
    }

    // begin_dialog targets resolve through the context, so entries never cross contexts
    let byDialog = this.descriptions.get(dialogContext);
    if (!byDialog) {
      byDialog = new WeakMap();
      this.descriptions.set(dialogContext, byDialog);
    }
    let byLocale = byDialog.get(dialog);
    if (!byLocale) {
      byLocale = new Map();
      byDialog.set(dialog, byLocale);
    }
    const cached = byLocale.get(locale);
    if (cached) {
      return cached;
    }
    const described = describeDialog(dialog, dialogContext, locale);
    byLocale.set(locale, described);
    return described;
  }
}
