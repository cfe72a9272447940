export const COMMIT_MESSAGE_TEMPLATE = `Write a one-line Conventional Commit summary for the following staged diff.

Rules:
- Format: <type>: <description>
- <type> is one of feat, fix, docs, style, refactor, perf, test, build, ci, chore, revert.
- <description> is imperative, lowercase, at most 60 characters, no trailing period.
- Describe what changed and why, not how.
- Output only the single line, no preamble, no quotes, no code fences.

Diff:
{diff}
{guidance}
`;

export const PR_AND_COMMITS_TEMPLATE = `You are preparing a pull request and one commit per change group.

Each change group below has a "group_id", its files, a suggested type and
description, and the combined staged diff for those files.

Change groups:
{{change_groups_json}}

Write:
1. A pull request title (at most 72 characters) and a Markdown body with a one-line
   summary followed by "## Changes" (bulleted) and "## Testing" sections.
2. Exactly one commit message per change group, using that group's "group_id" verbatim.
   Each message is a Conventional Commit subject line, optionally followed by a blank
   line and a short body.

Respond with a single JSON object and nothing else, in this shape:
\`\`\`json
{
  "pull_request": { "title": "...", "body": "..." },
  "commits": [ { "group_id": "group-1", "message": "feat: ..." } ]
}
\`\`\`

{{guidance}}
`;

// split/join instead of String.replace: diffs routinely contain "$&" and "$1"
const substitute = (template: string, placeholder: string, value: string): string =>
  template.split(placeholder).join(value);

export const renderCommitPrompt = (diff: string, guidance = ""): string => {
  const guidanceText = guidance.trim() ? `\nAdditional guidance: ${guidance.trim()}` : "";
  // guidance first, so a diff containing "{guidance}" is left alone
  return substitute(substitute(COMMIT_MESSAGE_TEMPLATE, "{guidance}", guidanceText), "{diff}", diff);
};

export const renderPrAndCommitsPrompt = (changeGroupsJson: string, guidance = ""): string =>
  substitute(
    substitute(PR_AND_COMMITS_TEMPLATE, "{{guidance}}", guidance),
    "{{change_groups_json}}",
    changeGroupsJson
  );
