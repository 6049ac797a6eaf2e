/**
 * Priming Turn
 *
 * Boundary between the dialog engine and the context stack. The engine
 * hands over its per-turn state bag; the stack is attached to it lazily
 * and discarded when the turn ends.
 *
 * beginDialog() pushes before awaiting anything and endDialog() pops
 * before awaiting anything, so stack state never lags behind the dialog
 * chain across suspension points.
 */

import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { createDialogContext, type DialogSet } from "../dialogs/dialog-set.js";
import type { Dialog, DialogContext } from "../dialogs/types.js";
import { DialogNotFoundError } from "../errors.js";
import type { InputContext } from "../types.js";
import { PrimingContextStack, type BeginOptions, type ContextFrame } from "./stack.js";

/**
 * Transient per-turn state owned by the engine.
 */
export interface TurnState {
  primingStack?: PrimingContextStack;
}

export interface StackOptions {
  memoize?: boolean;
}

/**
 * Return the stack attached to this turn, creating it on first use.
 */
export function getContextStack(turnState: TurnState, baseLocale: string, options: StackOptions = {}): PrimingContextStack {
  if (!turnState.primingStack) {
    turnState.primingStack = new PrimingContextStack({
      baseLocale,
      memoize: options.memoize ?? config.priming.memoizeDescriptions,
    });
  }
  return turnState.primingStack;
}

/**
 * Engine suspension points around begin/end (e.g. awaiting a recognizer).
 * They run after the stack has already been updated.
 */
export interface TurnHooks {
  onBegin?: (frame: ContextFrame) => Promise<void> | void;
  onEnd?: (frame: ContextFrame) => Promise<void> | void;
}

export interface PrimingTurnOptions {
  dialogs: DialogSet;
  /** Turn locale; defaults to PRIMING_DEFAULT_LOCALE */
  locale?: string;
  turnState?: TurnState;
  memoize?: boolean;
  hooks?: TurnHooks;
}

export interface TurnEndOptions {
  /** Open frames are normal for this caller (e.g. a partial replay); log them at debug */
  openFramesExpected?: boolean;
}

export class PrimingTurn {
  readonly turnState: TurnState;
  readonly dialogContext: DialogContext;
  private readonly dialogs: DialogSet;
  private readonly hooks: TurnHooks;
  private readonly memoize: boolean | undefined;

  constructor(options: PrimingTurnOptions) {
    const locale = options.locale ?? config.priming.defaultLocale;
    this.dialogs = options.dialogs;
    this.turnState = options.turnState ?? {};
    this.hooks = options.hooks ?? {};
    this.memoize = options.memoize;
    this.dialogContext = createDialogContext(options.dialogs, locale);
  }

  get stack(): PrimingContextStack {
    return getContextStack(this.turnState, this.dialogContext.locale, { memoize: this.memoize });
  }

  getInputContext(): InputContext {
    return this.stack.getInputContext();
  }

  async beginDialog(dialogId: string, options: BeginOptions = {}): Promise<ContextFrame> {
    const frame = this.stack.onDialogBegin(this.resolve(dialogId), this.dialogContext, options);
    await this.hooks.onBegin?.(frame);
    return frame;
  }

  /**
   * The dialog must be the one `dialogId` names and must currently be on
   * top; the ask action of an adaptive dialog reports through here.
   */
  declareExpectedProperties(dialogId: string, properties: readonly string[]): ContextFrame {
    return this.stack.onExpectedPropertiesDeclared(this.resolve(dialogId), properties);
  }

  async endDialog(dialogId: string): Promise<ContextFrame> {
    const frame = this.stack.onDialogEnd({ id: dialogId });
    await this.hooks.onEnd?.(frame);
    return frame;
  }

  /**
   * Conversation reset: unwind every frame unconditionally.
   */
  cancelAllDialogs(): number {
    return this.stack.unwind();
  }

  /**
   * Turn end. Frames still open here usually mean the engine skipped an
   * end event; they are dropped so nothing leaks into the next turn.
   */
  end(options: TurnEndOptions = {}): void {
    const stack = this.turnState.primingStack;
    if (!stack) {
      return;
    }
    if (stack.depth > 0) {
      const fields = { depth: stack.depth, open_dialogs: stack.snapshot().map((frame) => frame.dialogId) };
      if (options.openFramesExpected) {
        log.debug(fields, "Turn ended with open priming frames");
      } else {
        log.warn(fields, "Turn ended with open priming frames");
      }
      stack.unwind();
    }
    delete this.turnState.primingStack;
  }

  private resolve(dialogId: string): Dialog {
    const dialog = this.dialogs.find(dialogId);
    if (!dialog) {
      throw new DialogNotFoundError(dialogId);
    }
    return dialog;
  }
}
