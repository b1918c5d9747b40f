import { promises as fs, type Stats } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import fg from "fast-glob";

export interface ToolContext {
  /** Directory that relative paths and commands resolve against */
  cwd: string;
}

const MAX_SEARCH_RESULTS = 50;
const MAX_SEARCH_FILE_BYTES = 1024 * 1024;
const MAX_SNIPPET_CHARS = 400;

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/") || p.startsWith("~\\")) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

function resolvePath(p: string, ctx: ToolContext): { display: string; full: string } {
  const display = expandHome(p);
  return { display, full: path.resolve(ctx.cwd, display) };
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function read_file(p: string, ctx: ToolContext): Promise<string> {
  const { display, full } = resolvePath(p, ctx);
  try {
    const content = await fs.readFile(full, "utf8");
    return content ? content : "(empty file)";
  } catch (err) {
    switch (errorCode(err)) {
      case "ENOENT":
        return `Error: File not found: ${display}`;
      case "EACCES":
      case "EPERM":
        return `Error: Permission denied: ${display}`;
      default:
        return `Error reading file: ${errorMessage(err)}`;
    }
  }
}

export async function write_file(
  p: string,
  content: string,
  ctx: ToolContext
): Promise<string> {
  const { display, full } = resolvePath(p, ctx);
  try {
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, "utf8");
    // Count code points, not UTF-16 units
    return `Successfully wrote ${[...content].length} characters to ${display}`;
  } catch (err) {
    const code = errorCode(err);
    if (code === "EACCES" || code === "EPERM") {
      return `Error: Permission denied: ${display}`;
    }
    return `Error writing file: ${errorMessage(err)}`;
  }
}

/** Non-overlapping occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export async function edit_file(
  p: string,
  oldContent: string,
  newContent: string,
  ctx: ToolContext
): Promise<string> {
  const { display, full } = resolvePath(p, ctx);
  try {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(full, "utf8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return `Error: File not found: ${display}`;
      }
      throw err;
    }

    if (!oldContent) {
      return "Error: 'old_content' must not be empty.";
    }

    const occurrences = countOccurrences(fileContent, oldContent);
    if (occurrences === 0) {
      return "Error: Could not find the exact 'old_content' in the file. Please make sure the search block matches exactly (including indentation and spaces).";
    }
    if (occurrences > 1) {
      return `Error: The 'old_content' block was found ${occurrences} times. Please provide a more specific unique block to replace.`;
    }

    // Splice instead of String.replace, which would expand "$&" and friends
    const index = fileContent.indexOf(oldContent);
    const updated =
      fileContent.slice(0, index) +
      newContent +
      fileContent.slice(index + oldContent.length);

    await fs.writeFile(full, updated, "utf8");
    return `Successfully edited ${display}. Replaced unique occurrence of the specified block.`;
  } catch (err) {
    return `Error editing file: ${errorMessage(err)}`;
  }
}

export async function list_directory(
  p: string,
  ctx: ToolContext
): Promise<string> {
  const { display, full } = resolvePath(p || ".", ctx);
  try {
    const names = (await fs.readdir(full)).sort();
    const entries: string[] = [];
    for (const name of names) {
      if (name.startsWith(".")) continue;
      const entryPath = path.join(full, name);
      let stats: Stats;
      try {
        stats = await fs.stat(entryPath);
      } catch {
        // dangling symlink
        stats = await fs.lstat(entryPath);
      }
      if (stats.isDirectory()) {
        entries.push(`📁 ${name}/`);
      } else {
        entries.push(`📄 ${name} (${stats.size} bytes)`);
      }
    }
    return entries.length > 0 ? entries.join("\n") : "(empty directory)";
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return `Error: Directory not found: ${display}`;
    }
    return `Error listing directory: ${errorMessage(err)}`;
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function compileSearchPattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch {
    return new RegExp(escapeRegExp(pattern));
  }
}

async function searchFile(
  file: string,
  label: string,
  regex: RegExp,
  hits: string[]
): Promise<void> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(file);
  } catch {
    return; /* unreadable files are skipped, like grep -s */
  }
  if (buffer.length > MAX_SEARCH_FILE_BYTES || buffer.includes(0)) {
    return;
  }

  const lines = buffer.toString("utf8").split(/\r?\n/);
  for (let i = 0; i < lines.length && hits.length < MAX_SEARCH_RESULTS; i++) {
    if (regex.test(lines[i])) {
      hits.push(`${label}:${i + 1}:${lines[i].slice(0, MAX_SNIPPET_CHARS)}`);
    }
  }
}

export async function search_files(
  pattern: string,
  searchPath: string,
  filePattern: string | undefined,
  ctx: ToolContext
): Promise<string> {
  const { display, full } = resolvePath(searchPath || ".", ctx);
  const regex = compileSearchPattern(pattern);
  const hits: string[] = [];

  try {
    const stats = await fs.stat(full);
    if (stats.isFile()) {
      await searchFile(full, display, regex, hits);
    } else {
      const files = await fg(filePattern || "**/*", {
        cwd: full,
        dot: true,
        onlyFiles: true,
        baseNameMatch: true,
        followSymbolicLinks: false,
        ignore: ["**/node_modules/**", "**/.git/**"],
      });
      const prefix = display.replace(/[\\/]+$/, "");
      for (const rel of files.sort()) {
        if (hits.length >= MAX_SEARCH_RESULTS) break;
        await searchFile(path.join(full, rel), `${prefix}/${rel}`, regex, hits);
      }
    }
  } catch (err) {
    return `Error searching: ${errorMessage(err)}`;
  }

  return hits.length > 0
    ? hits.join("\n")
    : `No matches found for pattern: ${pattern}`;
}
