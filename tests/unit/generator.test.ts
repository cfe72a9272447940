import { describe, it, expect, vi } from "vitest";
import {
  StructuredGenerator,
  describeExtractionFailure,
  extractJsonBlock,
  findBraceSpan,
  findFencedJson,
  parseGenerationOutput,
  serializeGroups,
} from "../../src/services/generator.js";
import type { ChangeGroup, GenerationRequest } from "../../src/types/common.js";

const makeGroup = (n: number): ChangeGroup => ({
  id: `group-${n}`,
  files: [`src/file-${n}.ts`],
  type: "feat",
  description: `change ${n}`,
  diff: `+ line ${n} with "quotes" and $& dollar`,
  message: `feat: change ${n}`,
});

const twoGroups = [makeGroup(1), makeGroup(2)];

const replyObject = {
  pull_request: { title: "Add two changes", body: "## Changes\n- one\n- two" },
  commits: [
    { group_id: "group-1", message: "feat: first change" },
    { group_id: "group-2", message: "feat: second change" },
  ],
};

const expectedOutput = {
  pullRequest: { title: "Add two changes", body: "## Changes\n- one\n- two" },
  commits: [
    { groupId: "group-1", message: "feat: first change" },
    { groupId: "group-2", message: "feat: second change" },
  ],
};

const generatorReplying = (reply: string) => {
  const route = vi.fn(async (_request: GenerationRequest) => reply);
  return { route, generator: new StructuredGenerator({ route }) };
};

describe("JSON block extraction", () => {
  it("finds a fenced json block", () => {
    expect(findFencedJson('Sure!\n```json\n{"a": {"b": 1}}\n```\nDone.')).toBe('{"a": {"b": 1}}');
  });

  it("finds a fence without a language tag", () => {
    expect(findFencedJson('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it("falls back to the first-to-last brace span", () => {
    expect(findFencedJson('Result: {"a": 1} and {"b": 2}.')).toBeUndefined();
    expect(findBraceSpan('Result: {"a": 1} and {"b": 2}.')).toBe('{"a": 1} and {"b": 2}');
    expect(extractJsonBlock('Result: {"a": 1}.')).toBe('{"a": 1}');
  });

  it("returns undefined when there is no object", () => {
    expect(extractJsonBlock("no json here")).toBeUndefined();
    expect(findBraceSpan("} backwards {")).toBeUndefined();
  });
});

describe("parseGenerationOutput", () => {
  it("parses a fenced reply the same as a bare one", () => {
    const json = JSON.stringify(replyObject, null, 2);

    const fenced = parseGenerationOutput(`Here you go:\n\`\`\`json\n${json}\n\`\`\``, twoGroups);
    const bare = parseGenerationOutput(json, twoGroups);

    expect(fenced).toEqual({ ok: true, output: expectedOutput });
    expect(bare).toEqual(fenced);
  });

  it("accepts the camelCase aliases", () => {
    const reply = JSON.stringify({
      pullRequest: replyObject.pull_request,
      commits: [
        { groupId: "group-1", message: "feat: first change" },
        { group_id: "group-2", message: "feat: second change" },
      ],
    });

    expect(parseGenerationOutput(reply, twoGroups)).toEqual({ ok: true, output: expectedOutput });
  });

  it("returns commits in submission order", () => {
    const reply = JSON.stringify({ ...replyObject, commits: [...replyObject.commits].reverse() });

    const result = parseGenerationOutput(reply, twoGroups);

    expect(result).toEqual({ ok: true, output: expectedOutput });
  });

  it("rejects a commit count that differs from the group count", () => {
    const reply = JSON.stringify({ ...replyObject, commits: [replyObject.commits[0]] });

    expect(parseGenerationOutput(reply, twoGroups)).toEqual({
      ok: false,
      failure: {
        kind: "SchemaValidationFailed",
        issues: [{ path: "commits", message: "expected 2 commit(s), got 1" }],
      },
    });
  });

  it("rejects unknown group ids", () => {
    const reply = JSON.stringify({
      ...replyObject,
      commits: [
        { group_id: "group-1", message: "feat: first change" },
        { group_id: "group-9", message: "feat: invented" },
      ],
    });

    expect(parseGenerationOutput(reply, twoGroups)).toEqual({
      ok: false,
      failure: {
        kind: "SchemaValidationFailed",
        issues: [
          { path: "commits.1.group_id", message: 'unknown group_id "group-9"' },
          { path: "commits", message: 'missing commit for group_id "group-2"' },
        ],
      },
    });
  });

  it("rejects duplicate group ids", () => {
    const reply = JSON.stringify({
      ...replyObject,
      commits: [
        { group_id: "group-1", message: "feat: first change" },
        { group_id: "group-1", message: "feat: again" },
      ],
    });

    const result = parseGenerationOutput(reply, twoGroups);

    expect(result.ok).toBe(false);
    if (result.ok || result.failure.kind !== "SchemaValidationFailed") return;
    expect(result.failure.issues[0]).toEqual({
      path: "commits.1.group_id",
      message: 'duplicate group_id "group-1"',
    });
  });

  it("reports a missing pull_request", () => {
    const reply = JSON.stringify({ commits: replyObject.commits });

    expect(parseGenerationOutput(reply, twoGroups)).toEqual({
      ok: false,
      failure: {
        kind: "SchemaValidationFailed",
        issues: [{ path: "pull_request", message: "pull_request is required" }],
      },
    });
  });

  it("names the field of a malformed commit", () => {
    const reply = JSON.stringify({ ...replyObject, commits: [{ group_id: "group-1" }, replyObject.commits[1]] });

    const result = parseGenerationOutput(reply, twoGroups);

    expect(result.ok).toBe(false);
    if (result.ok || result.failure.kind !== "SchemaValidationFailed") return;
    expect(result.failure.issues.map(issue => issue.path)).toEqual(["commits.0.message"]);
  });

  it("reports the raw text when no JSON is present", () => {
    expect(parseGenerationOutput("I could not do that.", twoGroups)).toEqual({
      ok: false,
      failure: { kind: "NoJsonFound", raw: "I could not do that." },
    });
  });

  it("reports only the offending block for invalid JSON", () => {
    const result = parseGenerationOutput("prefix { not: json, } suffix", twoGroups);

    expect(result.ok).toBe(false);
    if (result.ok || result.failure.kind !== "InvalidJson") return;
    expect(result.failure.block).toBe("{ not: json, }");
  });
});

describe("StructuredGenerator", () => {
  it("sends the serialized groups and guidance in one call", async () => {
    const { route, generator } = generatorReplying(JSON.stringify(replyObject));

    const result = await generator.extract(twoGroups, "keep it short");

    expect(result).toEqual({ ok: true, output: expectedOutput });
    expect(route).toHaveBeenCalledTimes(1);
    const prompt = route.mock.calls[0]?.[0].prompt ?? "";
    expect(prompt).toContain(serializeGroups(twoGroups));
    expect(prompt).toContain("keep it short");
    expect(prompt).not.toContain("{{change_groups_json}}");
  });

  it("wraps a router failure as LLMCallFailed", async () => {
    const route = vi.fn(async (_request: GenerationRequest): Promise<string> => {
      throw new Error("All backends failed. local-model (attempt 1): download declined");
    });

    const result = await new StructuredGenerator({ route }).extract(twoGroups);

    expect(result.ok).toBe(false);
    if (result.ok || result.failure.kind !== "LLMCallFailed") return;
    expect(result.failure.cause.message).toBe("All backends failed. local-model (attempt 1): download declined");
  });

  it("round-trips group ids echoed by the model in order", async () => {
    const groups = [makeGroup(1), makeGroup(2), makeGroup(3), makeGroup(4)];
    const route = vi.fn(async (request: GenerationRequest): Promise<string> => {
      const prompt = request.prompt ?? "";
      const json = prompt.slice(prompt.indexOf("Change groups:\n") + "Change groups:\n".length, prompt.indexOf("\n\nWrite:"));
      const parsed: unknown = JSON.parse(json);
      const ids = Array.isArray(parsed)
        ? parsed.map((entry: unknown) =>
            typeof entry === "object" && entry !== null && "group_id" in entry ? String(entry.group_id) : ""
          )
        : [];
      return JSON.stringify({
        pull_request: { title: "Echo", body: "" },
        commits: ids.map(id => ({ group_id: id, message: `chore: ${id}` })),
      });
    });

    const result = await new StructuredGenerator({ route }).extract(groups);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.output.commits.map(commit => commit.groupId)).toEqual(groups.map(group => group.id));
  });
});

describe("describeExtractionFailure", () => {
  it("lists schema issues by path", () => {
    expect(
      describeExtractionFailure({
        kind: "SchemaValidationFailed",
        issues: [{ path: "commits", message: "expected 2 commit(s), got 1" }],
      })
    ).toBe("The model reply did not match the expected shape: commits: expected 2 commit(s), got 1");
  });

  it("includes the cause of a failed call", () => {
    expect(describeExtractionFailure({ kind: "LLMCallFailed", cause: new Error("timeout") })).toBe(
      "Generation call failed: timeout"
    );
  });
});
