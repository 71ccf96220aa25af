/**
 * Error Handler Middleware Tests
 *
 * Covers:
 * - ActionError subclasses map to the right HTTP status codes
 * - Unknown errors return 500 with a safe message
 * - Errors are logged server-side with context
 */

import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { Hono } from "hono";
import { z } from "zod";
import { ErrorCodeSchema } from "@deckbridge/shared";
import {
  ActionError,
  CollectionUnavailableError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from "../errors";
import { mapErrorCodeToStatus, restErrorHandler } from "../middleware/error-handler";

const RestErrorResponseSchema = z.object({
  error: z.object({ code: ErrorCodeSchema, message: z.string() }),
});

function createTestApp(errorToThrow: () => Error): Hono {
  const app = new Hono();
  app.onError(restErrorHandler);
  app.get("/test", () => {
    throw errorToThrow();
  });
  return app;
}

async function fetchError(app: Hono) {
  const res = await app.fetch(new Request("http://localhost/test"));
  return { status: res.status, body: RestErrorResponseSchema.parse(await res.json()) };
}

describe("mapErrorCodeToStatus", () => {
  it("maps every code", () => {
    expect(mapErrorCodeToStatus("UNSUPPORTED_ACTION")).toBe(400);
    expect(mapErrorCodeToStatus("VALIDATION_ERROR")).toBe(400);
    expect(mapErrorCodeToStatus("FORBIDDEN")).toBe(403);
    expect(mapErrorCodeToStatus("NOT_FOUND")).toBe(404);
    expect(mapErrorCodeToStatus("CONFLICT")).toBe(409);
    expect(mapErrorCodeToStatus("COLLECTION_UNAVAILABLE")).toBe(503);
    expect(mapErrorCodeToStatus("INTERNAL_ERROR")).toBe(500);
  });
});

describe("restErrorHandler", () => {
  let warnSpy: MockInstance;
  let errorSpy: MockInstance;

  beforeEach(() => {
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it.each([
    [() => new ValidationError("bad input"), 400, "VALIDATION_ERROR"],
    [() => new ForbiddenError("no key"), 403, "FORBIDDEN"],
    [() => new NotFoundError("no deck"), 404, "NOT_FOUND"],
    [() => new ConflictError("taken"), 409, "CONFLICT"],
    [() => new CollectionUnavailableError(), 503, "COLLECTION_UNAVAILABLE"],
    [() => new ActionError("unsupported action", "UNSUPPORTED_ACTION"), 400, "UNSUPPORTED_ACTION"],
  ] as const)("maps %# to its status", async (make, status, code) => {
    const { status: actual, body } = await fetchError(createTestApp(make));

    expect(actual).toBe(status);
    expect(body.error.code).toBe(code);
    expect(body.error.message).toBe(make().message);
  });

  it("logs action errors as warnings", async () => {
    await fetchError(createTestApp(() => new NotFoundError("no deck")));

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(String(warnSpy.mock.calls[0]?.[0])).toContain("GET /test - NOT_FOUND: no deck");
  });

  it("hides unexpected errors behind a 500", async () => {
    const { status, body } = await fetchError(createTestApp(() => new Error("secret stack detail")));

    expect(status).toBe(500);
    expect(body).toEqual({
      error: {
        code: "INTERNAL_ERROR",
        message: "An unexpected error occurred. Please try again later.",
      },
    });
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
