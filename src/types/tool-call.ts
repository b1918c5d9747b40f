import { z } from "zod";

export const ToolNameSchema = z
  .enum([
    "read_file",
    "write_file",
    "edit_file",
    "list_directory",
    "run_command",
    "search_files",
    "task_complete",
  ])
  .describe("The tool to call");

export type ToolName = z.infer<typeof ToolNameSchema>;

export const ReadFileArgsSchema = z
  .object({
    path: z
      .string()
      .describe("The path to the file to read (relative or absolute)"),
  })
  .describe("read_file arguments");

export const WriteFileArgsSchema = z
  .object({
    path: z.string().describe("The path to the file to write"),
    content: z.string().describe("The content to write to the file"),
  })
  .describe("write_file arguments");

export const EditFileArgsSchema = z
  .object({
    path: z.string().describe("The path to the file to edit"),
    old_content: z
      .string()
      .describe("The exact block of text to be replaced"),
    new_content: z.string().describe("The new text to insert instead"),
  })
  .describe("edit_file arguments");

export const ListDirectoryArgsSchema = z
  .object({
    path: z
      .string()
      .default(".")
      .describe("The directory path to list (default: current directory)"),
  })
  .describe("list_directory arguments");

export const RunCommandArgsSchema = z
  .object({
    command: z.string().describe("The shell command to execute"),
  })
  .describe("run_command arguments");

export const SearchFilesArgsSchema = z
  .object({
    pattern: z.string().describe("The search pattern (supports regex)"),
    path: z
      .string()
      .default(".")
      .describe("Directory to search in (default: current directory)"),
    file_pattern: z
      .string()
      .optional()
      .describe("File pattern to filter, e.g., '*.ts' (optional)"),
  })
  .describe("search_files arguments");

export const TaskCompleteArgsSchema = z
  .object({
    summary: z
      .string()
      .default("")
      .describe("A brief summary of what was accomplished"),
  })
  .describe("task_complete arguments");

export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: ToolName;
  description: string;
  schema: S;
}

export const TOOL_DEFINITIONS = {
  read_file: {
    name: "read_file",
    description:
      "Read the contents of a file at the given path. Use this to examine existing code or files.",
    schema: ReadFileArgsSchema,
  },
  write_file: {
    name: "write_file",
    description:
      "Write content to a file. Creates the file if it doesn't exist, overwrites if it does.",
    schema: WriteFileArgsSchema,
  },
  edit_file: {
    name: "edit_file",
    description:
      "Replace a specific block of text in a file with new content. This is preferred over write_file for large files.",
    schema: EditFileArgsSchema,
  },
  list_directory: {
    name: "list_directory",
    description:
      "List files and directories at the given path. Use this to explore the project structure.",
    schema: ListDirectoryArgsSchema,
  },
  run_command: {
    name: "run_command",
    description:
      "Run a shell command and return its output. Use for running tests, installing packages, git operations, etc.",
    schema: RunCommandArgsSchema,
  },
  search_files: {
    name: "search_files",
    description:
      "Search for a pattern in files using grep. Useful for finding where something is defined or used.",
    schema: SearchFilesArgsSchema,
  },
  task_complete: {
    name: "task_complete",
    description:
      "Call this when the task is complete and no more actions are needed.",
    schema: TaskCompleteArgsSchema,
  },
} satisfies { [K in ToolName]: ToolDefinition & { name: K } };

// Tools with no side effects; the agent may run them without asking
export const READ_ONLY_TOOLS: ReadonlySet<string> = new Set<ToolName>([
  "read_file",
  "list_directory",
  "search_files",
]);

/**
 * A tool call as it was written by the model. `name` is not checked
 * against the known tools here; the executor reports unknown names back
 * to the model.
 */
export interface ToolCall {
  name: string;
  args: Record<string, unknown>;
}

export interface ToolOutcome {
  result: string;
  isComplete: boolean;
}

export function isToolName(name: string): name is ToolName {
  return ToolNameSchema.safeParse(name).success;
}
