import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { build } from "../../src/server.js";
import { SERVICE_VERSION } from "../../src/version.js";
import { _resetConfigCache } from "../../src/config/index.js";
import { setTestSink, TelemetryEvents } from "../../src/utils/telemetry.js";
import { bookingDialog, localisedRecognizer } from "../helpers/priming-fixtures.js";

const EMPTY_WIRE = { intents: [], entities: [], dynamic_lists: [] };

const CITY_ONLY = {
  intents: [],
  entities: [{ name: "city", source: "travel" }],
  dynamic_lists: [{ entity: "city", list: [{ canonical_form: "Seattle", synonyms: ["Seattle", "SEA", "Emerald City"] }] }],
};

const CABIN = {
  intents: [],
  entities: [{ name: "number" }],
  dynamic_lists: [
    {
      entity: "askCabin",
      list: [
        { canonical_form: "economy", synonyms: ["economy"] },
        { canonical_form: "business", synonyms: ["business", "Business class"] },
      ],
    },
  ],
};

describe("priming routes", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await build();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _resetConfigCache();
    setTestSink(null);
  });

  describe("GET /healthz", () => {
    it("reports service identity", async () => {
      const res = await app.inject({ method: "GET", url: "/healthz" });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.ok).toBe(true);
      expect(body.service).toBe("speech-priming-service");
      expect(body.version).toBe(SERVICE_VERSION);
    });

    it("echoes an incoming request id", async () => {
      const res = await app.inject({ method: "GET", url: "/healthz", headers: { "x-request-id": "req-123" } });
      expect(res.headers["x-request-id"]).toBe("req-123");
    });
  });

  describe("POST /v1/priming/describe", () => {
    it("describes a recognizer for a locale", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/describe",
        payload: { recognizer: localisedRecognizer(), locale: "fr-fr" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        target: "recognizer",
        locale: "fr-fr",
        description: { intents: [], entities: [{ name: "ordinal" }], dynamic_lists: [] },
      });
    });

    it("describes a dialog tree", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/describe",
        payload: { dialog: bookingDialog() },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.target).toBe("dialog");
      expect(body.locale).toBeNull();
      expect(body.description.intents).toEqual([
        { name: "BookFlight", source: "travel" },
        { name: "Cancel", source: "travel" },
      ]);
      expect(body.description.entities).toEqual([
        { name: "city", source: "travel" },
        { name: "datetime" },
        { name: "number" },
        { name: "boolean" },
      ]);
    });

    it("describes a dialog without a locale under the default locale", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/describe",
        payload: { dialog: { kind: "adaptive", id: "intl", recognizer: localisedRecognizer(), triggers: [] } },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().description).toEqual({ intents: [], entities: [{ name: "number" }], dynamic_lists: [] });
    });

    it("resolves begin_dialog targets from the supplied dialogs", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/describe",
        payload: {
          dialog: {
            kind: "adaptive",
            id: "root",
            triggers: [{ event: "begin_dialog", actions: [{ kind: "begin_dialog", id: "jump", dialog: "pin" }] }],
          },
          dialogs: [{ kind: "number_input", id: "pin" }],
        },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().description).toEqual({ intents: [], entities: [{ name: "number" }], dynamic_lists: [] });
    });

    it("reports an unresolved begin_dialog target as bad input", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/describe",
        payload: {
          dialog: {
            kind: "adaptive",
            id: "root",
            triggers: [{ event: "begin_dialog", actions: [{ kind: "begin_dialog", id: "jump", dialog: "pin" }] }],
          },
        },
      });

      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.schema).toBe("error.v1");
      expect(body.code).toBe("BAD_INPUT");
      expect(body.message).toBe('Dialog "pin" is not registered in the dialog set');
      expect(body.details).toEqual({ priming_code: "DIALOG_NOT_FOUND" });
    });

    it("rejects a body carrying both a recognizer and a dialog", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/describe",
        payload: { recognizer: localisedRecognizer(), dialog: bookingDialog() },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().code).toBe("BAD_INPUT");
      expect(res.json().message).toBe("Validation failed");
    });

    it("rejects an unknown recognizer kind", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/describe",
        payload: { recognizer: { kind: "speech_grammar" } },
      });
      expect(res.statusCode).toBe(400);
    });

    it("rejects two different dialogs with one id", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/describe",
        payload: { dialog: { kind: "number_input", id: "dup" }, dialogs: [{ kind: "confirm_input", id: "dup" }] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().details).toEqual({ priming_code: "DUPLICATE_DIALOG_ID" });
    });
  });

  describe("POST /v1/priming/context", () => {
    it("replays a nested turn and snapshots every event", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/context",
        payload: {
          dialogs: [bookingDialog()],
          events: [
            { type: "begin", dialog_id: "booking" },
            { type: "expect", dialog_id: "booking", properties: ["destination"] },
            { type: "begin", dialog_id: "askCabin" },
            { type: "end", dialog_id: "askCabin" },
            { type: "end", dialog_id: "booking" },
          ],
        },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.depth).toBe(0);
      expect(body.frames).toEqual([]);
      expect(body.input_context).toEqual({ locale: "en-us", possible: EMPTY_WIRE, expected: EMPTY_WIRE });

      expect(body.events.map((e: { depth: number }) => e.depth)).toEqual([1, 1, 2, 1, 0]);
      expect(body.events[1].input_context.expected).toEqual(CITY_ONLY);
      expect(body.events[1].input_context.possible).toEqual(CITY_ONLY);
      expect(body.events[2].input_context.expected).toEqual(CABIN);
      expect(body.events[3].input_context.expected).toEqual(CITY_ONLY);
      expect(body.events[4].input_context.expected).toEqual(EMPTY_WIRE);
    });

    it("returns frames still open at the end of the replay", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/context",
        payload: {
          locale: "de-de",
          dialogs: [bookingDialog()],
          events: [
            { type: "begin", dialog_id: "booking" },
            { type: "begin", dialog_id: "askCabin", locale: "fr-fr" },
          ],
        },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.depth).toBe(2);
      expect(body.frames.map((f: { dialog_id: string; locale: string }) => [f.dialog_id, f.locale])).toEqual([
        ["booking", "de-de"],
        ["askCabin", "fr-fr"],
      ]);
      expect(body.input_context.locale).toBe("fr-fr");
      expect(body.input_context.expected).toEqual(CABIN);
    });

    it("unwinds on cancel", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/context",
        payload: {
          dialogs: [bookingDialog()],
          events: [{ type: "begin", dialog_id: "booking" }, { type: "begin", dialog_id: "askCabin" }, { type: "cancel" }],
        },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.depth).toBe(0);
      expect(body.events[2]).toEqual({
        index: 2,
        type: "cancel",
        dialog_id: null,
        depth: 0,
        input_context: { locale: "en-us", possible: EMPTY_WIRE, expected: EMPTY_WIRE },
      });
    });

    it("reports a mismatched end as a conflict with the event index", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/context",
        payload: {
          dialogs: [bookingDialog()],
          events: [
            { type: "begin", dialog_id: "booking" },
            { type: "end", dialog_id: "askCabin" },
          ],
        },
      });

      expect(res.statusCode).toBe(409);
      const body = res.json();
      expect(body.code).toBe("CONFLICT");
      expect(body.message).toBe('Dialog "askCabin" is not the active dialog (top is "booking")');
      expect(body.details).toEqual({ priming_code: "STACK_MISMATCH", event_index: 1 });
    });

    it("reports an unknown dialog id as bad input", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/context",
        payload: { dialogs: [bookingDialog()], events: [{ type: "begin", dialog_id: "checkout" }] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().details).toEqual({ priming_code: "DIALOG_NOT_FOUND", event_index: 0 });
    });

    it("reports an undeclared property as bad input", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/context",
        payload: {
          dialogs: [bookingDialog()],
          events: [
            { type: "begin", dialog_id: "booking" },
            { type: "expect", dialog_id: "booking", properties: ["seat"] },
          ],
        },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().details).toEqual({ priming_code: "SCHEMA_BINDING_MISSING", event_index: 1 });
    });

    it("caps the number of events", async () => {
      vi.stubEnv("PRIMING_MAX_REPLAY_EVENTS", "2");
      _resetConfigCache();

      const res = await app.inject({
        method: "POST",
        url: "/v1/priming/context",
        payload: { dialogs: [bookingDialog()], events: [{ type: "cancel" }, { type: "cancel" }, { type: "cancel" }] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().code).toBe("BAD_INPUT");
    });

    it("emits a completion event", async () => {
      const seen: Array<{ name: string; data: Record<string, unknown> }> = [];
      setTestSink((name, data) => seen.push({ name, data }));

      await app.inject({
        method: "POST",
        url: "/v1/priming/context",
        payload: { dialogs: [bookingDialog()], events: [{ type: "begin", dialog_id: "booking" }] },
      });

      const completed = seen.filter((e) => e.name === TelemetryEvents.ContextReplayCompleted);
      expect(completed).toHaveLength(1);
      expect(completed[0].data.event_count).toBe(1);
      expect(completed[0].data.final_depth).toBe(1);
    });
  });

  it("answers unknown routes with error.v1", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/priming/nowhere" });

    expect(res.statusCode).toBe(404);
    expect(res.json().code).toBe("NOT_FOUND");
    expect(res.json().schema).toBe("error.v1");
  });
});
