import { describe, it, expect, vi, beforeEach } from "vitest";

const { CANCEL } = vi.hoisted(() => ({ CANCEL: Symbol("cancel") }));

vi.mock("@clack/prompts", () => ({
  select: vi.fn(),
  isCancel: (value: unknown) => value === CANCEL,
}));

import { select } from "@clack/prompts";
import {
  AutoApprover,
  InteractiveApprover,
  needsApproval,
} from "../core/approval.js";

describe("needsApproval", () => {
  const defaults = { autoApproveAll: false, autoApproveReads: true };

  it("should let read-only tools through when reads are auto-approved", () => {
    expect(needsApproval("read_file", defaults)).toBe(false);
    expect(needsApproval("list_directory", defaults)).toBe(false);
    expect(needsApproval("search_files", defaults)).toBe(false);
  });

  it("should ask before tools with side effects", () => {
    expect(needsApproval("write_file", defaults)).toBe(true);
    expect(needsApproval("edit_file", defaults)).toBe(true);
    expect(needsApproval("run_command", defaults)).toBe(true);
  });

  it("should ask before unknown tools", () => {
    expect(needsApproval("format_disk", defaults)).toBe(true);
  });

  it("should ask before reads when auto-approval of reads is off", () => {
    expect(
      needsApproval("read_file", { autoApproveAll: false, autoApproveReads: false })
    ).toBe(true);
  });

  it("should never ask for task_complete", () => {
    expect(
      needsApproval("task_complete", { autoApproveAll: false, autoApproveReads: false })
    ).toBe(false);
  });

  it("should never ask when everything is auto-approved", () => {
    expect(
      needsApproval("run_command", { autoApproveAll: true, autoApproveReads: false })
    ).toBe(false);
  });
});

describe("InteractiveApprover", () => {
  const call = { name: "run_command", args: { command: "npm test" } };

  beforeEach(() => {
    vi.mocked(select).mockReset();
  });

  it("should pass the user's choice through", async () => {
    vi.mocked(select).mockResolvedValueOnce("skip");
    expect(await new InteractiveApprover().confirm(call)).toBe("skip");

    vi.mocked(select).mockResolvedValueOnce("approve");
    expect(await new InteractiveApprover().confirm(call)).toBe("approve");
  });

  it("should treat a cancelled prompt as quit", async () => {
    vi.mocked(select).mockResolvedValueOnce(CANCEL);
    expect(await new InteractiveApprover().confirm(call)).toBe("quit");
  });
});

describe("AutoApprover", () => {
  it("should approve everything", async () => {
    expect(await new AutoApprover().confirm()).toBe("approve");
  });
});
