import { describe, expect, it } from "vitest";
import {
  AssetNotFoundError,
  BackendUnavailableError,
  InvalidDurationError,
  InvalidRequestError,
  TokenRejectedError,
  WriteConflictError,
} from "../errors/gatewayErrors.js";
import { PublicError, toPublicError } from "./publicErrorHandler.js";

function view(err: unknown) {
  const mapped = toPublicError(err);
  return { status: mapped.statusCode, message: mapped.message, code: mapped.code };
}

describe("toPublicError", () => {
  it("hides the reason a token was rejected", () => {
    for (const failure of ["invalid", "expired", "wrong_audience", "wrong_subject"] as const) {
      expect(view(new TokenRejectedError(failure, "detail"))).toEqual({
        status: 401,
        message: "Unauthorized",
        code: "UNAUTHORIZED",
      });
    }
  });

  it("keeps the message of request errors", () => {
    expect(view(new InvalidRequestError("limit must be a positive integer"))).toEqual({
      status: 400,
      message: "limit must be a positive integer",
      code: "BAD_REQUEST",
    });
    expect(view(new InvalidDurationError(901, 900))).toEqual({
      status: 400,
      message: "Token duration 901s is not within 1..900s",
      code: "INVALID_DURATION",
    });
  });

  it("hides backend details", () => {
    expect(view(new BackendUnavailableError("FotoWare GET /x failed (HTTP 503)", { status: 503 })))
      .toEqual({ status: 502, message: "Backend unavailable", code: "BACKEND_UNAVAILABLE" });
    expect(view(new AssetNotFoundError("/fotoweb/archives/5000/a.info"))).toEqual({
      status: 404,
      message: "Not found",
      code: "NOT_FOUND",
    });
    expect(view(new WriteConflictError("/a", ["826"]))).toEqual({
      status: 409,
      message: "Conflict",
      code: "CONFLICT",
    });
  });

  it("keeps the client status of body parser failures", () => {
    const tooLarge = Object.assign(new Error("request entity too large"), {
      status: 413,
      type: "entity.too.large",
    });
    expect(view(tooLarge)).toEqual({
      status: 413,
      message: "Payload too large",
      code: "PAYLOAD_TOO_LARGE",
    });

    const malformed = Object.assign(new SyntaxError("Unexpected token n in JSON"), {
      statusCode: 400,
    });
    expect(view(malformed)).toEqual({ status: 400, message: "Bad request", code: "BAD_REQUEST" });
  });

  it("does not trust a server status carried on a foreign error", () => {
    const upstream = Object.assign(new Error("socket hang up"), { status: 503 });
    expect(view(upstream)).toEqual({
      status: 500,
      message: "internal server error",
      code: "INTERNAL",
    });
  });

  it("passes public errors through and masks anything else", () => {
    const teapot = new PublicError("short and stout", 418, "TEAPOT");
    expect(toPublicError(teapot)).toBe(teapot);
    expect(view(new TypeError("x is undefined"))).toEqual({
      status: 500,
      message: "internal server error",
      code: "INTERNAL",
    });
  });
});
