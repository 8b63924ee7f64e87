import { describe, it, expect } from "vitest";
import { textResponse, errorResponse, successResponse, resultToResponse } from "../src/mcp.js";
import { Ok, Err } from "../src/result.js";

describe("MCP utilities", () => {
  describe("textResponse", () => {
    it("creates a text-only response", () => {
      expect(textResponse("Graph built")).toEqual({
        content: [{ type: "text", text: "Graph built" }],
      });
    });
  });

  describe("errorResponse", () => {
    it("prefixes the message and flags the error", () => {
      expect(errorResponse("root not found")).toEqual({
        content: [{ type: "text", text: "Error: root not found" }],
        structuredContent: { success: false, error: "root not found" },
        isError: true,
      });
    });
  });

  describe("successResponse", () => {
    it("adds success to the structured data", () => {
      expect(successResponse("2 files", { files: 2 })).toEqual({
        content: [{ type: "text", text: "2 files" }],
        structuredContent: { files: 2, success: true },
      });
    });
  });

  describe("resultToResponse", () => {
    const format = (count: number) => ({ text: `${count} cycles`, data: { count } });

    it("formats a success", () => {
      expect(resultToResponse(Ok(3), format)).toEqual({
        content: [{ type: "text", text: "3 cycles" }],
        structuredContent: { count: 3, success: true },
      });
    });

    it("turns an error into an error response", () => {
      const response = resultToResponse(Err(new Error("no graph")), format);
      expect(response.content[0].text).toBe("Error: no graph");
      expect(response.structuredContent).toEqual({ success: false, error: "no graph" });
    });
  });
});
