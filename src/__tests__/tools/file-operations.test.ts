import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  read_file,
  write_file,
  edit_file,
  list_directory,
  search_files,
  countOccurrences,
  compileSearchPattern,
  expandHome,
  type ToolContext,
} from "../../tools/file-operations.js";

describe("File Operations", () => {
  let testDir: string;
  let ctx: ToolContext;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "agent-files-"));
    ctx = { cwd: testDir };
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe("read_file", () => {
    it("should return file contents", async () => {
      await fs.writeFile(path.join(testDir, "notes.txt"), "line one\nline two\n");
      expect(await read_file("notes.txt", ctx)).toBe("line one\nline two\n");
    });

    it("should mark an empty file", async () => {
      await fs.writeFile(path.join(testDir, "empty.txt"), "");
      expect(await read_file("empty.txt", ctx)).toBe("(empty file)");
    });

    it("should report a missing file with the path as given", async () => {
      expect(await read_file("missing.txt", ctx)).toBe(
        "Error: File not found: missing.txt"
      );
    });

    it("should read absolute paths", async () => {
      const file = path.join(testDir, "abs.txt");
      await fs.writeFile(file, "absolute");
      expect(await read_file(file, { cwd: os.tmpdir() })).toBe("absolute");
    });
  });

  describe("write_file", () => {
    it("should create parent directories and report the character count", async () => {
      const result = await write_file("src/deep/hello.ts", "export {};\n", ctx);
      expect(result).toBe("Successfully wrote 11 characters to src/deep/hello.ts");
      expect(
        await fs.readFile(path.join(testDir, "src/deep/hello.ts"), "utf-8")
      ).toBe("export {};\n");
    });

    it("should count code points rather than UTF-16 units", async () => {
      const result = await write_file("emoji.txt", "a😀b", ctx);
      expect(result).toBe("Successfully wrote 3 characters to emoji.txt");
    });

    it("should overwrite an existing file", async () => {
      await fs.writeFile(path.join(testDir, "x.txt"), "old");
      await write_file("x.txt", "new", ctx);
      expect(await fs.readFile(path.join(testDir, "x.txt"), "utf-8")).toBe("new");
    });
  });

  describe("edit_file", () => {
    const file = "app.ts";

    beforeEach(async () => {
      await fs.writeFile(
        path.join(testDir, file),
        "function hello() {\n  return 'hi';\n}\n"
      );
    });

    it("should replace a unique block", async () => {
      const result = await edit_file(file, "return 'hi';", "return 'hello';", ctx);
      expect(result).toBe(
        "Successfully edited app.ts. Replaced unique occurrence of the specified block."
      );
      expect(await fs.readFile(path.join(testDir, file), "utf-8")).toBe(
        "function hello() {\n  return 'hello';\n}\n"
      );
    });

    it("should insert replacement text literally", async () => {
      await edit_file(file, "'hi'", "'$&$1'", ctx);
      expect(await fs.readFile(path.join(testDir, file), "utf-8")).toBe(
        "function hello() {\n  return '$&$1';\n}\n"
      );
    });

    it("should refuse a block that is not in the file", async () => {
      const result = await edit_file(file, "return 'bye';", "x", ctx);
      expect(result).toBe(
        "Error: Could not find the exact 'old_content' in the file. Please make sure the search block matches exactly (including indentation and spaces)."
      );
    });

    it("should refuse a block that appears more than once", async () => {
      await fs.writeFile(path.join(testDir, file), "a = 1\na = 1\n");
      const result = await edit_file(file, "a = 1", "a = 2", ctx);
      expect(result).toBe(
        "Error: The 'old_content' block was found 2 times. Please provide a more specific unique block to replace."
      );
      expect(await fs.readFile(path.join(testDir, file), "utf-8")).toBe(
        "a = 1\na = 1\n"
      );
    });

    it("should refuse an empty block", async () => {
      expect(await edit_file(file, "", "x", ctx)).toBe(
        "Error: 'old_content' must not be empty."
      );
    });

    it("should report a missing file", async () => {
      expect(await edit_file("nope.ts", "a", "b", ctx)).toBe(
        "Error: File not found: nope.ts"
      );
    });
  });

  describe("list_directory", () => {
    it("should list sorted entries and skip hidden ones", async () => {
      await fs.mkdir(path.join(testDir, "src"));
      await fs.writeFile(path.join(testDir, "b.txt"), "12345");
      await fs.writeFile(path.join(testDir, "a.txt"), "");
      await fs.writeFile(path.join(testDir, ".env"), "SECRET=test-secret");

      expect(await list_directory(".", ctx)).toBe(
        ["📄 a.txt (0 bytes)", "📄 b.txt (5 bytes)", "📁 src/"].join("\n")
      );
    });

    it("should mark an empty directory", async () => {
      expect(await list_directory(".", ctx)).toBe("(empty directory)");
    });

    it("should report a missing directory", async () => {
      expect(await list_directory("ghost", ctx)).toBe(
        "Error: Directory not found: ghost"
      );
    });
  });

  describe("search_files", () => {
    beforeEach(async () => {
      await fs.mkdir(path.join(testDir, "src"));
      await fs.mkdir(path.join(testDir, "node_modules", "dep"), { recursive: true });
      await fs.writeFile(
        path.join(testDir, "src", "a.ts"),
        "const answer = 42;\nexport default answer;\n"
      );
      await fs.writeFile(path.join(testDir, "src", "b.md"), "The answer is here\n");
      await fs.writeFile(
        path.join(testDir, "node_modules", "dep", "index.ts"),
        "answer\n"
      );
    });

    it("should list matches with path and line number", async () => {
      expect(await search_files("answer", ".", undefined, ctx)).toBe(
        [
          "./src/a.ts:1:const answer = 42;",
          "./src/a.ts:2:export default answer;",
          "./src/b.md:1:The answer is here",
        ].join("\n")
      );
    });

    it("should filter by file pattern", async () => {
      expect(await search_files("answer", "src", "*.md", ctx)).toBe(
        "src/b.md:1:The answer is here"
      );
    });

    it("should accept regular expressions", async () => {
      expect(await search_files("^export", "src", undefined, ctx)).toBe(
        "src/a.ts:2:export default answer;"
      );
    });

    it("should search a single file", async () => {
      expect(await search_files("42", "src/a.ts", undefined, ctx)).toBe(
        "src/a.ts:1:const answer = 42;"
      );
    });

    it("should report no matches", async () => {
      expect(await search_files("zebra", ".", undefined, ctx)).toBe(
        "No matches found for pattern: zebra"
      );
    });

    it("should report a search path that does not exist", async () => {
      const result = await search_files("x", "missing", undefined, ctx);
      expect(result.startsWith("Error searching: ")).toBe(true);
    });

    it("should skip binary files", async () => {
      await fs.writeFile(
        path.join(testDir, "src", "blob.bin"),
        Buffer.from([0x61, 0x6e, 0x73, 0x00, 0x77])
      );
      expect(await search_files("ans", "src", "*.bin", ctx)).toBe(
        "No matches found for pattern: ans"
      );
    });

    it("should stop after 50 matching lines", async () => {
      await fs.mkdir(path.join(testDir, "many"));
      await fs.writeFile(path.join(testDir, "many", "lines.txt"), "hit\n".repeat(60));

      const lines = (await search_files("hit", "many", undefined, ctx)).split("\n");

      expect(lines).toHaveLength(50);
      expect(lines[0]).toBe("many/lines.txt:1:hit");
      expect(lines[49]).toBe("many/lines.txt:50:hit");
    });

    it("should skip files larger than 1 MiB", async () => {
      await fs.mkdir(path.join(testDir, "big"));
      await fs.writeFile(
        path.join(testDir, "big", "large.txt"),
        "answer\n" + "x".repeat(1024 * 1024)
      );
      await fs.writeFile(path.join(testDir, "big", "small.txt"), "answer\n");

      expect(await search_files("answer", "big", undefined, ctx)).toBe(
        "big/small.txt:1:answer"
      );
    });

    it("should skip the .git directory", async () => {
      await fs.mkdir(path.join(testDir, ".git"));
      await fs.writeFile(path.join(testDir, ".git", "COMMIT_EDITMSG"), "answer\n");

      expect(await search_files("answer", ".", undefined, ctx)).toBe(
        [
          "./src/a.ts:1:const answer = 42;",
          "./src/a.ts:2:export default answer;",
          "./src/b.md:1:The answer is here",
        ].join("\n")
      );
    });
  });

  describe("helpers", () => {
    it("should count non-overlapping occurrences", () => {
      expect(countOccurrences("aaaa", "aa")).toBe(2);
      expect(countOccurrences("abc", "")).toBe(0);
    });

    it("should fall back to a literal search for an invalid regex", () => {
      const regex = compileSearchPattern("foo(");
      expect(regex.test("call foo(bar)")).toBe(true);
    });

    it("should expand a leading tilde", () => {
      expect(expandHome("~/project")).toBe(path.join(os.homedir(), "project"));
      expect(expandHome("a/~/b")).toBe("a/~/b");
    });
  });
});
