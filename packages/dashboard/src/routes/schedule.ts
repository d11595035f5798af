/**
 * Schedule API Routes
 *
 * Read views (table, weekday × time grid, delete options) and the three
 * mutations (manual add, natural-language add, delete). Every mutation
 * goes through ScheduleSync, which refetches before merging.
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import {
  WEEKDAYS,
  RECURRENCE_MODES,
  PARSE_HINT,
  filterByWeekday,
  labelOptions,
  parseCalendarDate,
  parseEvent,
  pivotWeekdayTime,
  rowLabel,
  sortForDisplay,
  type ScheduleTable,
  type StoredEvent,
  type SyncOutcome,
} from "@csv-scheduler/core";

// ─── Request Schemas ───

const WEEKDAY_FILTERS = ["All", ...WEEKDAYS] as const;

const viewQuerySchema = z.object({
  weekday: z.enum(WEEKDAY_FILTERS).default("All"),
});

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .refine((value) => parseCalendarDate(value) === value, "Invalid date");

const addEventBodySchema = z.object({
  date: isoDate,
  name: z.string().default(""),
  activity: z.string().default(""),
  time: z.string().default(""),
  recurrence: z.enum(RECURRENCE_MODES).default("None"),
  repeatCount: z.number().int().min(1).max(30).default(1),
});

const parseBodySchema = z.object({
  text: z.string().min(1),
});

const deleteByLabelBodySchema = z.object({
  label: z.string(),
});

// ─── Response Shapes ───

interface EventView extends StoredEvent {
  label: string;
}

function toView(table: ScheduleTable): EventView[] {
  return table.map((row) => ({ ...row, label: rowLabel(row) }));
}

function statusFor(outcome: SyncOutcome): number {
  switch (outcome.status) {
    case "committed":
      return 200;
    case "rejected":
      return 422;
    case "not-found":
      return 404;
    case "failed":
      switch (outcome.error) {
        case "missing-credential":
          return 503;
        case "conflict":
          return 409;
        default:
          return 502;
      }
  }
}

function outcomeBody(outcome: SyncOutcome) {
  switch (outcome.status) {
    case "committed":
      return {
        ok: true,
        action: outcome.action,
        statusCode: outcome.write.status,
        staleBase: outcome.write.staleBase,
        preview: toView(outcome.preview),
        latest: outcome.latest ? toView(outcome.latest) : null,
      };
    case "failed":
      return {
        ok: false,
        action: outcome.action,
        error: outcome.error,
        message: outcome.message,
        statusCode: outcome.statusCode,
        body: outcome.body,
        preview: outcome.preview ? toView(outcome.preview) : null,
      };
    case "rejected":
      return {
        ok: false,
        action: outcome.action,
        error: outcome.reason,
        message: outcome.hint,
      };
    case "not-found":
      return {
        ok: false,
        action: outcome.action,
        error: "not-found",
        message: `No matching event found for ${outcome.target}`,
      };
  }
}

function sendOutcome(reply: FastifyReply, outcome: SyncOutcome) {
  return reply.code(statusFor(outcome)).send(outcomeBody(outcome));
}

function badRequest(reply: FastifyReply, error: z.ZodError) {
  const message = error.issues
    .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
    .join("; ");
  return reply.code(400).send({ ok: false, error: "invalid-request", message });
}

/**
 * Register schedule routes
 */
export async function registerScheduleRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  /**
   * GET /api/schedule/health
   *
   * Store mode and whether writes are possible
   */
  fastify.get("/api/schedule/health", async () => {
    const loaded = await fastify.scheduleStore.load();
    return {
      mode: fastify.storeMode,
      credential: fastify.scheduleStore.hasCredential,
      source: loaded.source,
      rows: loaded.table.length,
    };
  });

  /**
   * GET /api/schedule
   *
   * Events sorted for display
   * Query params:
   *   - weekday: Monday..Sunday or All (default)
   */
  fastify.get("/api/schedule", async (request, reply) => {
    const query = viewQuerySchema.safeParse(request.query);
    if (!query.success) return badRequest(reply, query.error);

    const loaded = await fastify.scheduleStore.load();
    const events = sortForDisplay(filterByWeekday(loaded.table, query.data.weekday));
    return { source: loaded.source, count: events.length, events: toView(events) };
  });

  /**
   * GET /api/schedule/calendar
   *
   * Weekday × time grid of activities
   */
  fastify.get("/api/schedule/calendar", async (request, reply) => {
    const query = viewQuerySchema.safeParse(request.query);
    if (!query.success) return badRequest(reply, query.error);

    const loaded = await fastify.scheduleStore.load();
    const rows = sortForDisplay(filterByWeekday(loaded.table, query.data.weekday));
    return pivotWeekdayTime(rows);
  });

  /**
   * GET /api/schedule/labels
   *
   * Delete options in storage order
   */
  fastify.get("/api/schedule/labels", async () => {
    const loaded = await fastify.scheduleStore.load();
    return { options: labelOptions(loaded.table) };
  });

  /**
   * POST /api/schedule/events
   *
   * Add an event manually, optionally repeated daily or weekly
   */
  fastify.post("/api/schedule/events", async (request, reply) => {
    const body = addEventBodySchema.safeParse(request.body);
    if (!body.success) return badRequest(reply, body.error);

    const outcome = await fastify.scheduleSync.addManual(body.data);
    return sendOutcome(reply, outcome);
  });

  /**
   * POST /api/schedule/parse
   *
   * Add an event from text such as "Add gym on Wednesday for Sam at 7pm"
   */
  fastify.post("/api/schedule/parse", async (request, reply) => {
    const body = parseBodySchema.safeParse(request.body);
    if (!body.success) return badRequest(reply, body.error);

    const outcome = await fastify.scheduleSync.addParsed(body.data.text);
    return sendOutcome(reply, outcome);
  });

  /**
   * DELETE /api/schedule/events/:id
   *
   * Delete the single row with this id
   */
  fastify.delete<{ Params: { id: string } }>(
    "/api/schedule/events/:id",
    async (request, reply) => {
      const outcome = await fastify.scheduleSync.deleteById(request.params.id);
      return sendOutcome(reply, outcome);
    },
  );

  /**
   * POST /api/schedule/delete
   *
   * Delete every row rendering this label
   */
  fastify.post("/api/schedule/delete", async (request, reply) => {
    const body = deleteByLabelBodySchema.safeParse(request.body);
    if (!body.success) return badRequest(reply, body.error);

    const outcome = await fastify.scheduleSync.deleteByLabel(body.data.label);
    return sendOutcome(reply, outcome);
  });

  /**
   * POST /api/schedule/voice
   *
   * Transcribe speech and preview the parsed event (nothing is written)
   */
  fastify.post("/api/schedule/voice", async (_request, reply) => {
    const text = await fastify.speechToText.transcribe();
    if (text === null) {
      return reply.code(503).send({
        ok: false,
        error: "speech-unavailable",
        message: "Microphone not available in this environment. Use text input instead.",
      });
    }

    const parsed = parseEvent(text);
    return {
      ok: true,
      text,
      parsed,
      hint: parsed ? null : PARSE_HINT,
    };
  });
}
