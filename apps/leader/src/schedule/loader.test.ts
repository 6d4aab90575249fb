import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadScheduleFile, parseSchedule, ScheduleLoadError } from "./loader.js";

describe("parseSchedule", () => {
  it("returns the cues sorted by time", () => {
    const text = JSON.stringify([
      { time: 3, type: "note_off", channel: 1, note: 60 },
      { time: 1, type: "note_on", channel: 1, note: 60, velocity: 127, description: "Output 1 ON" },
      { time: 2, type: "control_change", channel: 2, control: 7, value: 64 },
    ]);

    expect(parseSchedule(text, "show.json")).toEqual([
      { time: 1, type: "note_on", channel: 1, note: 60, velocity: 127, description: "Output 1 ON" },
      { time: 2, type: "control_change", channel: 2, control: 7, value: 64 },
      { time: 3, type: "note_off", channel: 1, note: 60, velocity: 0 },
    ]);
  });

  it("rejects malformed JSON", () => {
    expect(() => parseSchedule("[{", "show.json")).toThrow(/^Invalid JSON in schedule show.json/);
  });

  it("rejects invalid cues with the failing path", () => {
    const text = JSON.stringify([{ time: 1, type: "note_on", channel: 0, note: 60, velocity: 1 }]);

    expect(() => parseSchedule(text, "show.json")).toThrow(ScheduleLoadError);
    expect(() => parseSchedule(text, "show.json")).toThrow("0.channel");
  });

  it("rejects a top-level object", () => {
    expect(() => parseSchedule("{}", "show.json")).toThrow(/^Invalid cues in schedule show.json/);
  });
});

describe("loadScheduleFile", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), "schedule-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a schedule file", async () => {
    const path = join(dir, "show.json");
    await writeFile(path, JSON.stringify([{ time: 0.5, type: "note_on", channel: 1, note: 64, velocity: 100 }]));

    await expect(loadScheduleFile(path)).resolves.toEqual([
      { time: 0.5, type: "note_on", channel: 1, note: 64, velocity: 100 },
    ]);
  });

  it("reports a missing file", async () => {
    const path = join(dir, "missing.json");

    await expect(loadScheduleFile(path)).rejects.toThrow(`Cannot read schedule ${path}`);
  });
});
