/**
 * Dialog definitions
 *
 * Closed tagged union over the dialog kinds the priming provider knows.
 * Inputs and composite (adaptive) dialogs carry priming signal; the
 * control-flow actions only shape which dialogs are reachable.
 */

import type { Recognizer } from "../recognizers/types.js";

interface DialogBase {
  /** Unique within a dialog set; also the stack frame identity */
  id: string;
}

// ============================================================================
// Inputs
// ============================================================================

interface InputBase extends DialogBase {
  prompt?: string;
  /** Memory path the input writes its result to */
  property?: string;
}

export interface NumberInput extends InputBase {
  kind: 'number_input';
}

export interface ConfirmInput extends InputBase {
  kind: 'confirm_input';
}

export interface TextInput extends InputBase {
  kind: 'text_input';
}

export interface AttachmentInput extends InputBase {
  kind: 'attachment_input';
}

export interface DateTimeInput extends InputBase {
  kind: 'date_time_input';
}

export interface ChoiceAction {
  title?: string;
  type?: string;
  value?: string;
}

export interface Choice {
  value: string;
  action?: ChoiceAction;
  synonyms?: string[];
}

export interface ChoiceRecognizerOptions {
  /** Do not prime the choice value itself (default false) */
  noValue?: boolean;
  /** Do not prime the action title (default false) */
  noAction?: boolean;
  /** Prime the number entity (default true) */
  recognizeNumbers?: boolean;
  /** Prime the ordinal entity (default true) */
  recognizeOrdinals?: boolean;
}

export interface ChoiceInput extends InputBase {
  kind: 'choice_input';
  choices: Choice[];
  recognizerOptions?: ChoiceRecognizerOptions;
}

// ============================================================================
// Composite
// ============================================================================

export interface SchemaProperty {
  type?: string;
  /** Entities that can fill the property; defaults to the property name */
  $entities?: string[];
}

export interface DialogSchema {
  type: 'object';
  properties: Record<string, SchemaProperty>;
}

export type TriggerEvent = 'begin_dialog' | 'intent' | 'unknown_intent' | 'end_of_actions' | 'event';

export interface Trigger {
  event: TriggerEvent;
  /** Intent name for `intent` triggers */
  intent?: string;
  /** Runtime guard; ignored when computing reachability */
  condition?: string;
  actions: Dialog[];
}

export interface AdaptiveDialog extends DialogBase {
  kind: 'adaptive';
  recognizer?: Recognizer;
  triggers: Trigger[];
  schema?: DialogSchema;
}

// ============================================================================
// Control Flow
// ============================================================================

export interface SendActivity extends DialogBase {
  kind: 'send_activity';
  activity: string;
}

export interface Ask extends DialogBase {
  kind: 'ask';
  activity: string;
  expectedProperties: string[];
}

export interface EndDialog extends DialogBase {
  kind: 'end_dialog';
  value?: string;
}

export interface SetProperty extends DialogBase {
  kind: 'set_property';
  property: string;
  value: string;
}

export interface IfCondition extends DialogBase {
  kind: 'if_condition';
  condition: string;
  actions: Dialog[];
  elseActions?: Dialog[];
}

export interface SwitchCase {
  value: string;
  actions: Dialog[];
}

export interface SwitchCondition extends DialogBase {
  kind: 'switch_condition';
  condition: string;
  cases: SwitchCase[];
  default?: Dialog[];
}

export interface Foreach extends DialogBase {
  kind: 'foreach';
  itemsProperty: string;
  actions: Dialog[];
}

/**
 * Starts another dialog of the dialog set by id.
 */
export interface BeginDialog extends DialogBase {
  kind: 'begin_dialog';
  dialog: string;
}

export type Dialog =
  | NumberInput
  | ConfirmInput
  | TextInput
  | AttachmentInput
  | DateTimeInput
  | ChoiceInput
  | AdaptiveDialog
  | SendActivity
  | Ask
  | EndDialog
  | SetProperty
  | IfCondition
  | SwitchCondition
  | Foreach
  | BeginDialog;

export type DialogKind = Dialog['kind'];

/**
 * What the providers need from the running engine.
 */
export interface DialogContext {
  /** Ambient turn locale */
  readonly locale: string;
  findDialog(id: string): Dialog | undefined;
}
