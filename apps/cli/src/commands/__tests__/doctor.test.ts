// apps/cli/src/commands/__tests__/doctor.test.ts
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
import { createDoctorCommand } from "../doctor.js";
import { createStatsCommand } from "../stats.js";
import { createDemoCommand } from "../demo.js";
import { loadConfig } from "../../config/loader.js";
import * as reporters from "../../output/reporters.js";
import { createMockConfig, createTestProgram, readStore, run, seedCollection } from "./helpers.js";

const mockLoadConfig = vi.mocked(loadConfig);

function seedBrokenCollection(): void {
  seedCollection((store) => {
    const a = store.add({ statement: "A" });
    const b = store.add({ statement: "B", proof: "by A" });
    const c = store.add({ statement: "C", category: "algebra" });
    store.addDependency(b, a);
    store.addDependency(c, b);
    store.delete(a);

    const d = store.add({ statement: "D" });
    const e = store.add({ statement: "E" });
    store.addDependency(d, e);
    store.addDependency(e, d);
  });
}

describe("doctor command", () => {
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.clearAllMocks();
    vol.reset();
    mockLoadConfig.mockResolvedValue({ config: createMockConfig(), configPath: null });
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it("reports dangling references and cycles", async () => {
    seedBrokenCollection();

    await run(createTestProgram(createDoctorCommand()), "doctor", "--json");

    expect(reporters.json).toHaveBeenCalledWith({
      dangling: [{ referencingId: "L1001", missingId: "L1000" }],
      repaired: false,
      cycles: [["L1003", "L1004"]],
    });
    expect((await readStore()).require("L1001").dependencies).toEqual(["L1000"]);
  });

  it("removes dangling references with --fix", async () => {
    seedBrokenCollection();

    await run(createTestProgram(createDoctorCommand()), "doctor", "--fix");

    expect((await readStore()).require("L1001").dependencies).toEqual([]);
    expect(reporters.header).toHaveBeenCalledWith("Removed dangling references");
    expect(reporters.header).toHaveBeenCalledWith("Dependency cycles");
    expect(reporters.listItem).toHaveBeenCalledWith("L1003 <-> L1004");
    expect(reporters.warning).not.toHaveBeenCalled();
  });

  it("suggests --fix without changing anything", async () => {
    seedBrokenCollection();

    await run(createTestProgram(createDoctorCommand()), "doctor");

    expect(reporters.warning).toHaveBeenCalledWith("Run `lemma doctor --fix` to remove them.");
  });

  it("reports a healthy collection", async () => {
    seedCollection((store) => {
      store.add({ statement: "A" });
    });

    await run(createTestProgram(createDoctorCommand()), "doctor");

    expect(reporters.success).toHaveBeenCalledWith("No dangling references or cycles");
  });
});

describe("stats command", () => {
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.clearAllMocks();
    vol.reset();
    mockLoadConfig.mockResolvedValue({ config: createMockConfig(), configPath: null });
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    seedBrokenCollection();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it("outputs statistics as JSON", async () => {
    await run(createTestProgram(createStatsCommand()), "stats", "--json");

    expect(reporters.json).toHaveBeenCalledWith(
      expect.objectContaining({
        totalLemmas: 4,
        withProof: 1,
        withoutProof: 3,
        withDependencies: 4,
        dependencyEdges: 4,
        danglingReferences: 1,
        cycles: 1,
        categories: { algebra: 1, uncategorized: 3 },
      }),
    );
  });

  it("prints key figures and tables", async () => {
    await run(createTestProgram(createStatsCommand()), "stats");

    expect(reporters.header).toHaveBeenCalledWith("Collection Statistics");
    expect(reporters.keyValue).toHaveBeenCalledWith("Total lemmas", "4");
    expect(reporters.keyValue).toHaveBeenCalledWith("Cycles", "1");
    expect(consoleLogSpy).toHaveBeenCalledTimes(2);
  });
});

describe("demo command", () => {
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.clearAllMocks();
    vol.reset();
    mockLoadConfig.mockResolvedValue({ config: createMockConfig(), configPath: null });
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it("seeds three linked lemmas and shows them", async () => {
    await run(createTestProgram(createDemoCommand()), "demo");

    const store = await readStore();
    expect(store.size).toBe(3);
    expect(store.require("L1002").dependencies).toEqual(["L1000", "L1001"]);
    expect(reporters.success).toHaveBeenCalledWith("Added 3 sample lemmas");
    expect(reporters.header).toHaveBeenCalledWith("L1002 as Markdown");
    expect(reporters.keyValue).toHaveBeenCalledWith(
      "L1002",
      "Sum of first n natural numbers = n(n+1)/2",
      1,
    );
    const [call] = consoleLogSpy.mock.calls;
    expect(String(call?.[0]).startsWith("## L1002\n\n**Category:** number_theory")).toBe(true);
  });
});
