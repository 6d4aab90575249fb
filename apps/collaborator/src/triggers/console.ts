import { describeCue, type Cue } from "@cuesync/shared";
import type { TriggerOutput } from "../media/player.js";

/**
 * Trigger output that logs each cue instead of driving hardware.
 */
export class ConsoleTriggerOutput implements TriggerOutput {
  private sent = 0;

  constructor(private readonly tag = "trigger") {}

  send(cue: Cue): void {
    this.sent++;
    console.log(`[${this.tag}] ${describeCue(cue)}`);
  }

  get sentCount(): number {
    return this.sent;
  }
}
