import { describe, it, expect } from "vitest";
import { describeDialog, resolveChoiceOptions } from "../../../src/priming/dialogs/describe.js";
import { DialogSet, childDialogs, createDialogContext } from "../../../src/priming/dialogs/dialog-set.js";
import type { AdaptiveDialog, ChoiceInput, Dialog } from "../../../src/priming/dialogs/types.js";
import { isEmptyAggregate } from "../../../src/priming/merge.js";
import {
  DialogNotFoundError,
  DuplicateDialogIdError,
  UnsupportedDialogKindError,
} from "../../../src/priming/errors.js";
import { bookingDialog, cyclicDialogs, localisedRecognizer, untypedDialog } from "../../helpers/priming-fixtures.js";

function describeAlone(dialog: Dialog, locale?: string) {
  return describeDialog(dialog, createDialogContext(new DialogSet([dialog]), locale ?? "en-us"), locale);
}

function colourChoice(options: ChoiceInput["recognizerOptions"] = undefined): ChoiceInput {
  return {
    kind: "choice_input",
    id: "askColour",
    choices: [{ value: "red" }, { value: "blue", action: { title: "Navy" }, synonyms: ["azure", "Navy"] }],
    recognizerOptions: options,
  };
}

describe("describeDialog", () => {
  describe("inputs", () => {
    it("primes the number entity for a number input", () => {
      expect(describeAlone({ kind: "number_input", id: "n" }).entities).toEqual([{ name: "number" }]);
    });

    it("primes the boolean entity for a confirm input", () => {
      expect(describeAlone({ kind: "confirm_input", id: "c" }).entities).toEqual([{ name: "boolean" }]);
    });

    it.each<Dialog>([
      { kind: "text_input", id: "askName" },
      { kind: "attachment_input", id: "askPhoto" },
      { kind: "date_time_input", id: "askWhen" },
    ])("contributes nothing for $kind", (dialog) => {
      expect(isEmptyAggregate(describeAlone(dialog))).toBe(true);
    });
  });

  describe("choice input", () => {
    it("primes value, action title and synonyms, keyed by the dialog id", () => {
      const described = describeAlone(colourChoice());

      expect(described.entities).toEqual([{ name: "number" }, { name: "ordinal" }]);
      expect([...described.vocabularyLists.keys()]).toEqual(["askColour"]);
      expect(described.vocabularyLists.get("askColour")?.entries).toEqual([
        { canonicalForm: "red", synonyms: ["red"] },
        { canonicalForm: "blue", synonyms: ["blue", "Navy", "azure"] },
      ]);
    });

    it("leaves out the value and the title when told to", () => {
      const described = describeAlone(colourChoice({ noValue: true, noAction: true }));

      expect(described.vocabularyLists.get("askColour")?.entries).toEqual([
        { canonicalForm: "red", synonyms: [] },
        { canonicalForm: "blue", synonyms: ["azure", "Navy"] },
      ]);
    });

    it("drops number and ordinal entities when disabled", () => {
      const described = describeAlone(colourChoice({ recognizeNumbers: false, recognizeOrdinals: false }));
      expect(described.entities).toEqual([]);
    });

    it("keeps ordinals alone when only numbers are disabled", () => {
      expect(describeAlone(colourChoice({ recognizeNumbers: false })).entities).toEqual([{ name: "ordinal" }]);
    });

    it("orders a choice's synonyms value first, then title, then configured synonyms", () => {
      const choice = (options?: ChoiceInput["recognizerOptions"]): ChoiceInput => ({
        kind: "choice_input",
        id: "pickOne",
        choices: [{ value: "value1", action: { title: "Action" }, synonyms: ["synonym1", "synonym2"] }],
        recognizerOptions: options,
      });

      const defaults = describeAlone(choice());
      expect(defaults.entities).toEqual([{ name: "number" }, { name: "ordinal" }]);
      expect(defaults.vocabularyLists.get("pickOne")?.entries).toEqual([
        { canonicalForm: "value1", synonyms: ["value1", "Action", "synonym1", "synonym2"] },
      ]);

      const bare = describeAlone(
        choice({ recognizeNumbers: false, recognizeOrdinals: false, noValue: true, noAction: true }),
      );
      expect(bare.entities).toEqual([]);
      expect(bare.vocabularyLists.get("pickOne")?.entries).toEqual([
        { canonicalForm: "value1", synonyms: ["synonym1", "synonym2"] },
      ]);
    });

    it("fills in recognizer option defaults", () => {
      expect(resolveChoiceOptions()).toEqual({
        noValue: false,
        noAction: false,
        recognizeNumbers: true,
        recognizeOrdinals: true,
      });
      expect(resolveChoiceOptions({ noAction: true }).noAction).toBe(true);
    });
  });

  describe("adaptive dialog", () => {
    it("merges its recognizer with every reachable child", () => {
      const described = describeAlone(bookingDialog());

      expect(described.intents).toEqual([
        { name: "BookFlight", source: "travel" },
        { name: "Cancel", source: "travel" },
      ]);
      expect(described.entities).toEqual([
        { name: "city", source: "travel" },
        { name: "datetime" },
        { name: "number" },
        { name: "boolean" },
      ]);
      expect([...described.vocabularyLists.keys()]).toEqual(["city", "askCabin"]);
      expect(described.vocabularyLists.get("askCabin")?.entries).toEqual([
        { canonicalForm: "economy", synonyms: ["economy"] },
        { canonicalForm: "business", synonyms: ["business", "Business class"] },
      ]);
    });

    it("describes an adaptive dialog without recognizer or triggers as empty", () => {
      expect(isEmptyAggregate(describeAlone({ kind: "adaptive", id: "blank", triggers: [] }))).toBe(true);
    });

    it("describes its recognizer for the given locale", () => {
      const dialog: AdaptiveDialog = { kind: "adaptive", id: "intl", recognizer: localisedRecognizer(), triggers: [] };
      expect(describeAlone(dialog, "fr-fr").entities).toEqual([{ name: "ordinal" }]);
      expect(describeAlone(dialog).entities).toEqual([{ name: "email" }]);
    });

    it("follows container actions and begin_dialog references", () => {
      const dialog: AdaptiveDialog = {
        kind: "adaptive",
        id: "root",
        triggers: [
          {
            event: "begin_dialog",
            actions: [
              {
                kind: "switch_condition",
                id: "route",
                condition: "turn.channel",
                cases: [{ value: "phone", actions: [{ kind: "begin_dialog", id: "goPin", dialog: "pin" }] }],
                default: [
                  {
                    kind: "foreach",
                    id: "eachItem",
                    itemsProperty: "dialog.items",
                    actions: [{ kind: "confirm_input", id: "confirmItem" }],
                  },
                ],
              },
            ],
          },
        ],
      };
      const pin: Dialog = { kind: "number_input", id: "pin" };
      const dialogContext = createDialogContext(new DialogSet([dialog, pin]), "en-us");

      expect(describeDialog(dialog, dialogContext).entities).toEqual([{ name: "number" }, { name: "boolean" }]);
    });

    it("terminates on begin_dialog cycles", () => {
      const { main, vipFlow } = cyclicDialogs();
      const dialogContext = createDialogContext(new DialogSet([main, vipFlow]), "en-us");

      expect(describeDialog(main, dialogContext).entities).toEqual([
        { name: "email" },
        { name: "boolean" },
        { name: "number" },
      ]);
    });

    it("fails when a begin_dialog target is not registered", () => {
      const dialog: AdaptiveDialog = {
        kind: "adaptive",
        id: "root",
        triggers: [{ event: "begin_dialog", actions: [{ kind: "begin_dialog", id: "jump", dialog: "missing" }] }],
      };

      expect(() => describeAlone(dialog)).toThrow(DialogNotFoundError);
      expect(() => describeAlone(dialog)).toThrow('Dialog "missing" is not registered in the dialog set');
    });
  });

  it("rejects a dialog kind it does not know", () => {
    const bogus = untypedDialog('{"kind":"teleport","id":"beam"}');
    expect(() => describeDialog(bogus, createDialogContext(new DialogSet(), "en-us"))).toThrow(
      'No priming provider registered for dialog kind "teleport"',
    );
  });
});

describe("DialogSet", () => {
  it("indexes nested children depth first", () => {
    const dialogs = new DialogSet([bookingDialog()]);
    expect(dialogs.ids()).toEqual(["booking", "askPassengers", "askCabin", "askDestination", "confirmCancel"]);
    expect(dialogs.find("askCabin")?.kind).toBe("choice_input");
    expect(dialogs.has("missing")).toBe(false);
  });

  it("ignores the same dialog added twice", () => {
    const dialog: Dialog = { kind: "number_input", id: "n" };
    const dialogs = new DialogSet([dialog]);
    dialogs.add(dialog);
    expect(dialogs.size).toBe(1);
  });

  it("rejects two different dialogs with the same id", () => {
    expect(
      () =>
        new DialogSet([
          { kind: "number_input", id: "dup" },
          { kind: "confirm_input", id: "dup" },
        ]),
    ).toThrow(DuplicateDialogIdError);
  });

  it("rejects an unknown kind among nested actions", () => {
    const dialog: AdaptiveDialog = {
      kind: "adaptive",
      id: "root",
      triggers: [{ event: "begin_dialog", actions: [untypedDialog('{"kind":"teleport","id":"beam"}')] }],
    };
    expect(() => new DialogSet([dialog])).toThrow(UnsupportedDialogKindError);
  });

  it("lists inline children but not begin_dialog targets", () => {
    const { main } = cyclicDialogs();
    const [checkVip] = childDialogs(main);

    expect(checkVip.id).toBe("checkVip");
    expect(childDialogs(checkVip).map((d) => d.id)).toEqual(["goVip", "askAge"]);
    expect(childDialogs({ kind: "begin_dialog", id: "goVip", dialog: "vipFlow" })).toEqual([]);
  });
});
