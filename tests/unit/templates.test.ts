import { describe, it, expect } from "vitest";
import { renderCommitPrompt, renderPrAndCommitsPrompt } from "../../src/prompts/templates.js";

describe("renderCommitPrompt", () => {
  it("inserts the diff verbatim, including replacement patterns", () => {
    const diff = "+ const s = text.replace(/x/, '$&$1');";

    const prompt = renderCommitPrompt(diff);

    expect(prompt).toContain(`Diff:\n${diff}\n`);
    expect(prompt).not.toContain("{diff}");
    expect(prompt).not.toContain("{guidance}");
    expect(prompt).not.toContain("Additional guidance");
  });

  it("appends trimmed guidance", () => {
    expect(renderCommitPrompt("+ x", "  mention the ticket  ")).toContain(
      "+ x\n\nAdditional guidance: mention the ticket"
    );
  });

  it("leaves a placeholder that appears inside the diff alone", () => {
    expect(renderCommitPrompt("+ log('{guidance}')", "be brief")).toContain("+ log('{guidance}')");
  });
});

describe("renderPrAndCommitsPrompt", () => {
  it("substitutes both placeholders", () => {
    const prompt = renderPrAndCommitsPrompt('[{"group_id":"group-1"}]', "focus on the API");

    expect(prompt).toContain('Change groups:\n[{"group_id":"group-1"}]\n');
    expect(prompt.trimEnd().endsWith("focus on the API")).toBe(true);
    expect(prompt).not.toContain("{{");
  });
});
