// apps/cli/src/commands/__tests__/link.test.ts
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { vol } from "memfs";

vi.mock("fs/promises", async () => {
  const memfs = await import("memfs");
  return {
    ...memfs.fs.promises,
    default: memfs.fs.promises,
  };
});

vi.mock("../../config/loader.js", () => ({
  loadConfig: vi.fn(),
}));

vi.mock("../../output/reporters.js", () => ({
  spinner: vi.fn(() => ({
    start: vi.fn(),
    stop: vi.fn(),
    text: "",
  })),
  success: vi.fn(),
  error: vi.fn(),
  info: vi.fn(),
  warning: vi.fn(),
  header: vi.fn(),
  keyValue: vi.fn(),
  listItem: vi.fn(),
  newline: vi.fn(),
  json: vi.fn(),
  setJsonMode: vi.fn(),
  configureOutput: vi.fn(),
}));

// Import after mocks are set up
import { createLinkCommand } from "../link.js";
import { createUnlinkCommand } from "../unlink.js";
import { createDepsCommand } from "../deps.js";
import { loadConfig } from "../../config/loader.js";
import * as reporters from "../../output/reporters.js";
import { createMockConfig, createTestProgram, readStore, run, seedCollection } from "./helpers.js";

const mockLoadConfig = vi.mocked(loadConfig);

describe("link and unlink commands", () => {
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    vol.reset();
    mockLoadConfig.mockResolvedValue({ config: createMockConfig(), configPath: null });
    processExitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
    seedCollection((store) => {
      store.add({ statement: "A" });
      store.add({ statement: "B" });
    });
  });

  afterEach(() => {
    processExitSpy.mockRestore();
  });

  it("links two lemmas", async () => {
    const program = createTestProgram(createLinkCommand());

    await run(program, "link", "L1001", "L1000");

    expect((await readStore()).require("L1001").dependencies).toEqual(["L1000"]);
    expect(reporters.success).toHaveBeenCalledWith("L1001 now depends on L1000");
  });

  it("refuses a self-loop", async () => {
    const program = createTestProgram(createLinkCommand());

    await expect(run(program, "link", "L1000", "L1000")).rejects.toThrow("process.exit called");

    expect(reporters.error).toHaveBeenCalledWith(
      "Could not link L1000 -> L1000: Lemma 'L1000' cannot depend on itself",
    );
  });

  it("refuses an unknown target", async () => {
    const program = createTestProgram(createLinkCommand());

    await expect(run(program, "link", "L1001", "L9")).rejects.toThrow("process.exit called");

    expect(reporters.error).toHaveBeenCalledWith("Could not link L1001 -> L9: Unknown lemma 'L9'");
    expect((await readStore()).require("L1001").dependencies).toEqual([]);
  });

  it("unlinks an existing dependency", async () => {
    await run(createTestProgram(createLinkCommand()), "link", "L1001", "L1000");

    await run(createTestProgram(createUnlinkCommand()), "unlink", "L1001", "L1000");

    expect((await readStore()).require("L1001").dependencies).toEqual([]);
    expect(reporters.success).toHaveBeenCalledWith("L1001 no longer depends on L1000");
  });

  it("warns when there is nothing to unlink", async () => {
    await run(createTestProgram(createUnlinkCommand()), "unlink", "L1000", "L1001");

    expect(reporters.warning).toHaveBeenCalledWith("L1000 does not depend on L1001");
  });
});

describe("deps command", () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    vol.reset();
    mockLoadConfig.mockResolvedValue({ config: createMockConfig(), configPath: null });
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
    seedCollection((store) => {
      const a = store.add({ statement: "A" });
      const b = store.add({ statement: "B" });
      const c = store.add({ statement: "C" });
      store.addDependency(b, a);
      store.addDependency(c, a);
      store.addDependency(c, b);
    });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  it("lists transitive dependencies", async () => {
    await run(createTestProgram(createDepsCommand()), "deps", "L1002", "--json");

    expect(reporters.json).toHaveBeenCalledWith({
      id: "L1002",
      direction: "dependencies",
      direct: false,
      ids: ["L1000", "L1001"],
    });
  });

  it("lists transitive dependents with --reverse", async () => {
    await run(createTestProgram(createDepsCommand()), "deps", "L1000", "--reverse", "--json");

    expect(reporters.json).toHaveBeenCalledWith({
      id: "L1000",
      direction: "dependents",
      direct: false,
      ids: ["L1001", "L1002"],
    });
  });

  it("limits to direct neighbours with --direct", async () => {
    await run(createTestProgram(createDepsCommand()), "deps", "L1001", "--reverse", "--direct", "--json");

    expect(reporters.json).toHaveBeenCalledWith({
      id: "L1001",
      direction: "dependents",
      direct: true,
      ids: ["L1002"],
    });
  });

  it("prints a table in human mode", async () => {
    await run(createTestProgram(createDepsCommand()), "deps", "L1002");

    expect(reporters.header).toHaveBeenCalledWith("All dependencies of L1002");
    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
  });

  it("fails for an unknown id", async () => {
    await expect(run(createTestProgram(createDepsCommand()), "deps", "L9")).rejects.toThrow(
      "process.exit called",
    );

    expect(reporters.error).toHaveBeenCalledWith("Unknown lemma 'L9'");
  });
});
