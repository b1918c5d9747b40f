import type { z } from "zod";
import {
  TOOL_DEFINITIONS,
  isToolName,
  type ToolCall,
  type ToolOutcome,
} from "../types/tool-call.js";
import {
  edit_file,
  list_directory,
  read_file,
  search_files,
  write_file,
} from "./file-operations.js";
import { run_command } from "./command-execution.js";

export * from "./file-operations.js";
export * from "./command-execution.js";

export interface ToolExecutionContext {
  cwd: string;
  commandTimeoutMs: number;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "args"}: ${issue.message}`)
    .join("; ");
}

function parseArgs<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  args: Record<string, unknown>
): { ok: true; args: z.infer<S> } | { ok: false; message: string } {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    return {
      ok: false,
      message: `Error: Invalid arguments for ${name}: ${formatIssues(parsed.error)}`,
    };
  }
  return { ok: true, args: parsed.data };
}

function notComplete(result: string): ToolOutcome {
  return { result, isComplete: false };
}

/**
 * Run one tool call. Tool failures come back as result text for the
 * model; this function does not throw for them.
 */
export async function executeTool(
  call: ToolCall,
  ctx: ToolExecutionContext
): Promise<ToolOutcome> {
  const { name } = call;
  if (!isToolName(name)) {
    return notComplete(`Unknown tool: ${name}`);
  }

  switch (name) {
    case "read_file": {
      const parsed = parseArgs(name, TOOL_DEFINITIONS.read_file.schema, call.args);
      if (!parsed.ok) return notComplete(parsed.message);
      return notComplete(await read_file(parsed.args.path, ctx));
    }
    case "write_file": {
      const parsed = parseArgs(name, TOOL_DEFINITIONS.write_file.schema, call.args);
      if (!parsed.ok) return notComplete(parsed.message);
      return notComplete(
        await write_file(parsed.args.path, parsed.args.content, ctx)
      );
    }
    case "edit_file": {
      const parsed = parseArgs(name, TOOL_DEFINITIONS.edit_file.schema, call.args);
      if (!parsed.ok) return notComplete(parsed.message);
      return notComplete(
        await edit_file(
          parsed.args.path,
          parsed.args.old_content,
          parsed.args.new_content,
          ctx
        )
      );
    }
    case "list_directory": {
      const parsed = parseArgs(name, TOOL_DEFINITIONS.list_directory.schema, call.args);
      if (!parsed.ok) return notComplete(parsed.message);
      return notComplete(await list_directory(parsed.args.path, ctx));
    }
    case "run_command": {
      const parsed = parseArgs(name, TOOL_DEFINITIONS.run_command.schema, call.args);
      if (!parsed.ok) return notComplete(parsed.message);
      return notComplete(
        await run_command(parsed.args.command, {
          cwd: ctx.cwd,
          timeoutMs: ctx.commandTimeoutMs,
        })
      );
    }
    case "search_files": {
      const parsed = parseArgs(name, TOOL_DEFINITIONS.search_files.schema, call.args);
      if (!parsed.ok) return notComplete(parsed.message);
      return notComplete(
        await search_files(
          parsed.args.pattern,
          parsed.args.path,
          parsed.args.file_pattern,
          ctx
        )
      );
    }
    case "task_complete": {
      const parsed = parseArgs(name, TOOL_DEFINITIONS.task_complete.schema, call.args);
      const summary = parsed.ok ? parsed.args.summary.trim() : "";
      return { result: summary || "Task completed.", isComplete: true };
    }
  }
}
