import { readFileSync } from "node:fs";
import { join } from "node:path";
import { zodToJsonSchema } from "zod-to-json-schema";
import { TOOL_DEFINITIONS } from "../types/tool-call.js";

export const PROJECT_INSTRUCTIONS_FILE = "AGENTS.md";

export const TOOL_SKIPPED_MESSAGE =
  "Tool execution was skipped by user. Please continue or try a different approach.";

export function toolResultMessage(result: string): string {
  return `Tool result:\n${result}\n\nContinue with the task or call task_complete if done.`;
}

/**
 * Load project-specific instructions from AGENTS.md in the working
 * directory, if the project has one.
 */
export function loadProjectInstructions(cwd: string): string | null {
  try {
    const text = readFileSync(join(cwd, PROJECT_INSTRUCTIONS_FILE), "utf-8").trim();
    return text || null;
  } catch {
    return null;
  }
}

function describeTools(): string {
  return Object.values(TOOL_DEFINITIONS)
    .map((tool) => {
      const schema = JSON.stringify(
        zodToJsonSchema(tool.schema, {
          target: "jsonSchema7",
          $refStrategy: "none",
        }),
        (key, value: unknown) =>
          key === "$schema" || key === "additionalProperties" ? undefined : value
      );
      return `- ${tool.name}: ${tool.description}\n  args schema: ${schema}`;
    })
    .join("\n");
}

export function buildSystemPrompt(cwd: string): string {
  const instructions = loadProjectInstructions(cwd);

  return `You are a helpful coding assistant with access to tools for reading/writing files and running commands.

Current working directory: ${cwd}

You have access to these tools:
${describeTools()}

IMPORTANT INSTRUCTIONS:
1. When you need to use a tool, respond with a JSON block in this exact format:
\`\`\`tool
{"tool": "tool_name", "args": {"param": "value"}}
\`\`\`

2. You can include explanation text before or after the tool block.
3. Only call ONE tool at a time, then wait for the result.
4. After receiving tool results, continue working or call task_complete when done.
5. Always read relevant files before modifying them.
6. For coding tasks, make sure to test your changes if possible.
7. Use edit_file for small changes in large files instead of write_file.
8. When using edit_file, ensure the 'old_content' matches EXACTLY what is in the file.

Example tool calls:
\`\`\`tool
{"tool": "list_directory", "args": {"path": "."}}
\`\`\`

\`\`\`tool
{"tool": "read_file", "args": {"path": "src/index.ts"}}
\`\`\`

\`\`\`tool
{"tool": "run_command", "args": {"command": "npm test"}}
\`\`\`

\`\`\`tool
{
  "tool": "edit_file",
  "args": {
    "path": "src/index.ts",
    "old_content": "function hello() {\\n  console.log('hi');",
    "new_content": "function hello() {\\n  console.log('hello world');"
  }
}
\`\`\`
${instructions ? `\nProject instructions (from ${PROJECT_INSTRUCTIONS_FILE}):\n${instructions}\n` : ""}`;
}
