/**
 * Schedule files: a JSON array of cues.
 */

import { readFile } from "fs/promises";
import { parseDatagram, sortCues, validateCueList, type Cue } from "@cuesync/shared";

export class ScheduleLoadError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = "ScheduleLoadError";
  }
}

/**
 * Parse schedule text into a sorted cue list.
 * Throws ScheduleLoadError naming `source` on bad JSON or invalid cues.
 */
export function parseSchedule(text: string, source: string): Cue[] {
  const parsed = parseDatagram(text);
  if (!parsed.success) {
    throw new ScheduleLoadError(`Invalid JSON in schedule ${source}: ${parsed.error}`, source);
  }

  const validated = validateCueList(parsed.data);
  if (!validated.success) {
    throw new ScheduleLoadError(`Invalid cues in schedule ${source}: ${validated.error}`, source);
  }

  return sortCues(validated.data);
}

export async function loadScheduleFile(path: string): Promise<Cue[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ScheduleLoadError(`Cannot read schedule ${path}: ${reason}`, path);
  }

  const cues = parseSchedule(text, path);
  console.log(`[schedule] loaded ${cues.length} cues from ${path}`);
  return cues;
}
