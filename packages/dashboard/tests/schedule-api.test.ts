/**
 * Schedule API Endpoint Tests
 *
 * Drives the HTTP surface with fastify.inject against the in-memory
 * contents API. No network.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import {
  MockContentsApi,
  PARSE_HINT,
  RemoteScheduleStore,
  ScheduleSync,
  type SpeechToText,
} from "@csv-scheduler/core";
import { createServer } from "../src/server.js";

const TOKEN = "test-secret";
const HEADER = "Date,Weekday,Name,Activity,Time\n";
const SAM_GYM = "2026-10-21,Wednesday,Sam,Gym,7pm\n";
const ANA_PIANO = "2026-10-19,Monday,Ana,Piano,5pm\n";
const ANA_YOGA = "2026-10-21,Wednesday,Ana,Yoga,7pm\n";
const CSV = HEADER + SAM_GYM + ANA_PIANO + ANA_YOGA;

// Tuesday morning
const NOW = new Date(2026, 9, 20, 9, 0);

// -------------------------------------------------------------------
// Test Setup
// -------------------------------------------------------------------

let api: MockContentsApi;
let app: FastifyInstance;

async function start(
  token: string | null = TOKEN,
  speech?: SpeechToText,
): Promise<void> {
  api = new MockContentsApi({ token: TOKEN, initialCsv: CSV });
  const store = new RemoteScheduleStore(api.storeConfig(token), {
    fetch: api.fetch,
  });
  app = await createServer({
    store,
    mode: "mock",
    sync: new ScheduleSync(store, { now: () => NOW }),
    speech,
    logger: false,
  });
  await app.ready();
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  await app.close();
});

// -------------------------------------------------------------------
// Reads
// -------------------------------------------------------------------

describe("GET /api/schedule", () => {
  beforeEach(() => start());

  it("returns events sorted for display with labels", async () => {
    const res = await app.inject({ method: "GET", url: "/api/schedule" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.source).toBe("api");
    expect(body.count).toBe(3);
    expect(body.events.map((e: { activity: string }) => e.activity)).toEqual([
      "Piano",
      "Gym",
      "Yoga",
    ]);
    expect(body.events[0].label).toBe("2026-10-19 | Monday | Ana - Piano @ 5pm");
  });

  it("filters by weekday", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/schedule?weekday=Wednesday",
    });

    expect(res.json().count).toBe(2);
  });

  it("rejects an unknown weekday", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/schedule?weekday=Funday",
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: "invalid-request" });
  });
});

describe("GET /api/schedule/calendar", () => {
  beforeEach(() => start());

  it("returns the weekday x time grid", async () => {
    const res = await app.inject({ method: "GET", url: "/api/schedule/calendar" });

    expect(res.json()).toEqual({
      times: ["5pm", "7pm"],
      weekdays: ["Monday", "Wednesday"],
      cells: {
        "5pm": { Monday: "Piano" },
        "7pm": { Wednesday: "Gym, Yoga" },
      },
    });
  });
});

describe("GET /api/schedule/labels", () => {
  beforeEach(() => start());

  it("lists delete options in storage order", async () => {
    const res = await app.inject({ method: "GET", url: "/api/schedule/labels" });

    const labels = res
      .json()
      .options.map((o: { label: string }) => o.label);
    expect(labels).toEqual([
      "2026-10-21 | Wednesday | Sam - Gym @ 7pm",
      "2026-10-19 | Monday | Ana - Piano @ 5pm",
      "2026-10-21 | Wednesday | Ana - Yoga @ 7pm",
    ]);
  });
});

describe("GET /api/schedule/health", () => {
  it("reports a writable API-backed store", async () => {
    await start();

    const res = await app.inject({ method: "GET", url: "/api/schedule/health" });

    expect(res.json()).toEqual({
      mode: "mock",
      credential: true,
      source: "api",
      rows: 3,
    });
  });

  it("reports read-only mode without a credential", async () => {
    await start(null);

    const res = await app.inject({ method: "GET", url: "/api/schedule/health" });

    expect(res.json()).toEqual({
      mode: "mock",
      credential: false,
      source: "mirror",
      rows: 3,
    });
  });
});

describe("GET /", () => {
  beforeEach(() => start());

  it("serves the single-page UI", async () => {
    const res = await app.inject({ method: "GET", url: "/" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toContain("text/html");
    expect(res.body).toContain("<title>Daily Scheduler</title>");
  });
});

// -------------------------------------------------------------------
// Mutations
// -------------------------------------------------------------------

describe("POST /api/schedule/events", () => {
  it("adds repeated events", async () => {
    await start();

    const res = await app.inject({
      method: "POST",
      url: "/api/schedule/events",
      payload: {
        date: "2026-10-21",
        name: "Leo",
        activity: "Chess",
        time: "9am",
        recurrence: "Weekly",
        repeatCount: 2,
      },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({ ok: true, action: "add", statusCode: 200, staleBase: false });
    expect(body.latest).toHaveLength(5);
    expect(api.puts[0].message).toBe("Add event(s) via UI");
    expect(api.content).toBe(
      CSV +
        "2026-10-21,Wednesday,Leo,Chess,9am\n" +
        "2026-10-28,Wednesday,Leo,Chess,9am\n",
    );
  });

  it("rejects an impossible date", async () => {
    await start();

    const res = await app.inject({
      method: "POST",
      url: "/api/schedule/events",
      payload: { date: "2026-02-30", name: "Leo" },
    });

    expect(res.statusCode).toBe(400);
    expect(api.puts).toHaveLength(0);
  });

  it("rejects a repeat count above 30", async () => {
    await start();

    const res = await app.inject({
      method: "POST",
      url: "/api/schedule/events",
      payload: { date: "2026-10-21", recurrence: "Daily", repeatCount: 31 },
    });

    expect(res.statusCode).toBe(400);
  });

  it("answers 503 with a preview in read-only mode", async () => {
    await start(null);

    const res = await app.inject({
      method: "POST",
      url: "/api/schedule/events",
      payload: { date: "2026-10-21", name: "Leo", activity: "Chess" },
    });

    expect(res.statusCode).toBe(503);
    const body = res.json();
    expect(body).toMatchObject({ ok: false, error: "missing-credential" });
    expect(body.preview).toHaveLength(4);
    expect(api.puts).toHaveLength(0);
  });
});

describe("POST /api/schedule/parse", () => {
  beforeEach(() => start());

  it("adds a parsed event", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/schedule/parse",
      payload: { text: "Add chess on Friday for Leo" },
    });

    expect(res.statusCode).toBe(200);
    expect(api.puts[0].message).toBe("Add event via NLP");
    expect(api.content).toBe(CSV + "2026-10-23,Friday,Leo,chess,\n");
  });

  it("answers 422 with a hint for unparseable text", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/schedule/parse",
      payload: { text: "walk the dog" },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      ok: false,
      action: "add",
      error: "parse",
      message: PARSE_HINT,
    });
  });
});

describe("deleting", () => {
  beforeEach(() => start());

  it("deletes one row by id", async () => {
    const labels = await app.inject({ method: "GET", url: "/api/schedule/labels" });
    const piano: { id: string } = labels.json().options[1];

    const res = await app.inject({
      method: "DELETE",
      url: `/api/schedule/events/${piano.id}`,
    });

    expect(res.statusCode).toBe(200);
    expect(api.puts[0].message).toBe("Delete event");
    expect(api.content).toBe(HEADER + SAM_GYM + ANA_YOGA);
  });

  it("answers 404 for an unknown id", async () => {
    const res = await app.inject({
      method: "DELETE",
      url: "/api/schedule/events/000000000000-0",
    });

    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe("not-found");
  });

  it("deletes by label", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/schedule/delete",
      payload: { label: "2026-10-21 | Wednesday | Sam - Gym @ 7pm" },
    });

    expect(res.statusCode).toBe(200);
    expect(api.content).toBe(HEADER + ANA_PIANO + ANA_YOGA);
  });
});

// -------------------------------------------------------------------
// Voice
// -------------------------------------------------------------------

describe("POST /api/schedule/voice", () => {
  it("answers 503 when no speech provider is available", async () => {
    await start();

    const res = await app.inject({ method: "POST", url: "/api/schedule/voice" });

    expect(res.statusCode).toBe(503);
    expect(res.json().error).toBe("speech-unavailable");
  });

  it("previews the parsed transcript without writing", async () => {
    await start(TOKEN, {
      id: "fake",
      transcribe: async () => "Add gym on Wednesday for Sam",
    });

    const res = await app.inject({ method: "POST", url: "/api/schedule/voice" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      ok: true,
      text: "Add gym on Wednesday for Sam",
      parsed: { name: "Sam", activity: "gym", weekday: "Wednesday" },
      hint: null,
    });
    expect(api.puts).toHaveLength(0);
  });
});
