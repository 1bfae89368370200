import { describe, it, expect } from "vitest";
import { createConsoleDiagnostics } from "./diagnostics.js";

describe("createConsoleDiagnostics", () => {
  it("writes comments and warnings", () => {
    const lines: string[] = [];
    const diagnostics = createConsoleDiagnostics({ write: (line) => lines.push(line) });

    diagnostics.comment("Exported by Agenda");
    diagnostics.warn("found an empty tag");

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain("Comment: Exported by Agenda");
    expect(lines[1]).toContain("warning: found an empty tag");
  });

  it("can hide comments but never warnings", () => {
    const lines: string[] = [];
    const diagnostics = createConsoleDiagnostics({ showComments: false, write: (line) => lines.push(line) });

    diagnostics.comment("ignored");
    diagnostics.warn("kept");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("warning: kept");
  });
});
