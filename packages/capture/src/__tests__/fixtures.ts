import { writeFileSync } from "node:fs";
import { join } from "node:path";

/** Two genuine user turns, a tool result, noise lines and a summary record. */
export const TWO_TURN_TRANSCRIPT = [
  { type: "user", message: { content: "Fix the login bug" } },
  {
    type: "assistant",
    message: {
      content: [
        { type: "text", text: "Looking." },
        { type: "tool_use", name: "Read", input: { file_path: "src/auth.ts" } },
        { type: "tool_use", name: "Edit", input: { file_path: "src/login.ts" } },
      ],
    },
  },
  { type: "user", message: { content: [{ type: "tool_result", content: "ok" }] } },
  "not json at all",
  "",
  {
    type: "user",
    message: {
      content: [
        { type: "text", text: "Now add" },
        { type: "text", text: "tests" },
      ],
    },
  },
  {
    type: "assistant",
    message: {
      content: [
        { type: "text", text: "Added tests." },
        { type: "tool_use", name: "Write", input: { file_path: "test/login.test.ts" } },
        { type: "tool_use", name: "Bash", input: { command: "npm test" } },
        { type: "tool_use", name: "MultiEdit", input: { file_path: "" } },
      ],
    },
  },
  { type: "summary", summary: "Login work" },
];

/** Write records as JSON Lines; string records are written verbatim. */
export function writeTranscript(dir: string, records: unknown[], name = "transcript.jsonl"): string {
  const file = join(dir, name);
  const body = records
    .map((r) => (typeof r === "string" ? r : JSON.stringify(r)))
    .join("\n");
  writeFileSync(file, body + "\n");
  return file;
}
