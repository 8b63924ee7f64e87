import { describe, it, expect } from "vitest";
import {
  Ok,
  Err,
  map,
  mapErr,
  andThen,
  unwrapOr,
  toError,
  tryCatch,
  tryCatchAsync,
  type Result,
} from "../src/result.js";

function parsePort(text: string): Result<number, string> {
  const port = Number(text);
  return Number.isInteger(port) ? Ok(port) : Err(`not a port: ${text}`);
}

describe("Result", () => {
  describe("Ok and Err", () => {
    it("tags success", () => {
      expect(Ok(42)).toEqual({ ok: true, value: 42 });
    });

    it("tags failure", () => {
      expect(Err("failed")).toEqual({ ok: false, error: "failed" });
    });
  });

  describe("map", () => {
    it("transforms a success value", () => {
      expect(map(parsePort("80"), (n) => n * 2)).toEqual(Ok(160));
    });

    it("passes an error through", () => {
      expect(map(parsePort("x"), (n) => n * 2)).toEqual(Err("not a port: x"));
    });
  });

  describe("mapErr", () => {
    it("transforms an error", () => {
      const result = mapErr(parsePort("x"), (message) => new Error(message));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("not a port: x");
    });

    it("leaves a success alone", () => {
      expect(mapErr(parsePort("22"), (message) => message.length)).toEqual(Ok(22));
    });
  });

  describe("andThen", () => {
    const positive = (n: number): Result<number, string> => (n > 0 ? Ok(n) : Err("not positive"));

    it("chains successes", () => {
      expect(andThen(parsePort("8080"), positive)).toEqual(Ok(8080));
    });

    it("stops at the first error", () => {
      expect(andThen(parsePort("0"), positive)).toEqual(Err("not positive"));
      expect(andThen(parsePort("y"), positive)).toEqual(Err("not a port: y"));
    });
  });

  describe("unwrapOr", () => {
    it("returns the value or the default", () => {
      expect(unwrapOr(parsePort("443"), 0)).toBe(443);
      expect(unwrapOr(parsePort("?"), 0)).toBe(0);
    });
  });

  describe("toError", () => {
    it("keeps Error instances", () => {
      const error = new TypeError("bad");
      expect(toError(error)).toBe(error);
    });

    it("wraps other values", () => {
      expect(toError("boom").message).toBe("boom");
      expect(toError(7).message).toBe("7");
    });
  });

  describe("tryCatch", () => {
    it("captures a return value", () => {
      expect(tryCatch((): unknown => JSON.parse("[1]"))).toEqual(Ok([1]));
    });

    it("captures a thrown error", () => {
      const result = tryCatch(() => {
        throw new Error("nope");
      });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("nope");
    });
  });

  describe("tryCatchAsync", () => {
    it("captures a resolved value", async () => {
      expect(await tryCatchAsync(async () => "done")).toEqual(Ok("done"));
    });

    it("captures a rejection with a non-Error value", async () => {
      const result = await tryCatchAsync(() => Promise.reject("lost"));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(Error);
      expect(result.error.message).toBe("lost");
    });
  });
});
