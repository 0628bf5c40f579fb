import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Verbosity } from "../../schemas/config.schema.js";
import {
  TOOL_DETAIL_RANK,
  ToolLoggingPolicy,
  UnknownToolPolicyError,
  byteSize,
} from "../tool-logging-policy.js";

const registered = [
  ["file_read", "truncate"],
  ["file_write", "metadata_only"],
  ["line_count", "full"],
] as const;

describe("ToolLoggingPolicy.resolve", () => {
  const policy = new ToolLoggingPolicy(registered);

  it("hides tool detail at low verbosity", () => {
    expect(policy.resolve("line_count", "low")).toBe("none");
  });

  it("follows the strategy at mid verbosity", () => {
    expect(policy.resolve("line_count", "mid")).toBe("full");
    expect(policy.resolve("file_read", "mid")).toBe("truncated");
    expect(policy.resolve("file_write", "mid")).toBe("metadata");
  });

  it("shows everything at high verbosity", () => {
    expect(policy.resolve("file_write", "high")).toBe("full");
  });

  it("never shows less at a higher verbosity", () => {
    const order: Verbosity[] = ["low", "mid", "high"];
    for (const [tool] of registered) {
      const ranks = order.map((v) => TOOL_DETAIL_RANK[policy.resolve(tool, v)]);
      expect(ranks).toEqual([...ranks].sort((a, b) => a - b));
    }
  });
});

describe("unknown tools", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it("fall back to metadata_only with a single warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const policy = new ToolLoggingPolicy(registered);
    expect(policy.has("mystery")).toBe(false);
    expect(policy.resolve("mystery", "mid")).toBe("metadata");
    expect(policy.resolve("mystery", "mid")).toBe("metadata");
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("ToolLoggingPolicy.fromRegistered", () => {
  it("applies overrides to registered tools", () => {
    const policy = ToolLoggingPolicy.fromRegistered(registered, { file_read: "full" });
    expect(policy.strategyFor("file_read")).toBe("full");
    expect(policy.strategyFor("file_write")).toBe("metadata_only");
  });

  it("rejects overrides for unregistered tools", () => {
    expect(() => ToolLoggingPolicy.fromRegistered(registered, { fiel_read: "full" })).toThrow(
      UnknownToolPolicyError,
    );
  });
});

describe("applyDetail", () => {
  const policy = new ToolLoggingPolicy(registered, { truncateLimit: 5 });
  const args = { path: "logs/app.jsonl", content: "0123456789", overwrite: true };

  it("omits arguments at none", () => {
    expect(policy.applyDetail(args, "none")).toBeUndefined();
  });

  it("describes only types and sizes at metadata", () => {
    expect(policy.applyDetail(args, "metadata")).toEqual({
      path: "<string, 14 bytes>",
      content: "<string, 10 bytes>",
      overwrite: "<boolean, 4 bytes>",
    });
  });

  it("caps every string at truncated, recursively", () => {
    expect(policy.applyDetail({ ...args, nested: ["abcdefgh"] }, "truncated")).toEqual({
      path: "logs/...[truncated]",
      content: "01234...[truncated]",
      overwrite: true,
      nested: ["abcde...[truncated]"],
    });
  });

  it("passes values through at full", () => {
    expect(policy.applyDetail(args, "full")).toBe(args);
  });
});

describe("summarizeResult", () => {
  const policy = new ToolLoggingPolicy(registered, { truncateLimit: 4 });

  it("shapes a result per detail level", () => {
    expect(policy.summarizeResult("hello world", "none")).toBe("");
    expect(policy.summarizeResult("hello world", "metadata")).toBe("11 bytes");
    expect(policy.summarizeResult("hello world", "truncated")).toBe("hell...[truncated]");
    expect(policy.summarizeResult("hello world", "full")).toBe("hello world");
  });

  it("leaves short results untouched when truncating", () => {
    expect(policy.summarizeResult("ok", "truncated")).toBe("ok");
  });
});

describe("byteSize", () => {
  it("measures utf-8 bytes of strings and JSON of other values", () => {
    expect(byteSize("é")).toBe(2);
    expect(byteSize({ a: 1 })).toBe(7);
    expect(byteSize(undefined)).toBe(0);
  });
});
