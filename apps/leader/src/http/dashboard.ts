/**
 * Dashboard commands over socket.io.
 *
 * - START_SESSION { cues? } - start (or restart) a session; without cues the
 *   loaded schedule is used
 * - STOP_SESSION {}
 * - UPDATE_SCHEDULE { cues }
 *
 * Every command is answered with COMMAND_RESULT to the sending socket.
 */

import type { Socket } from "socket.io";
import { z } from "zod";
import { CueListSchema, formatZodError, type Cue, type LeaderStatus } from "@cuesync/shared";

export const StartSessionEventSchema = z.object({
  cues: CueListSchema.optional(),
});

export const UpdateScheduleEventSchema = z.object({
  cues: CueListSchema,
});

export const DASHBOARD_COMMANDS = ["START_SESSION", "STOP_SESSION", "UPDATE_SCHEDULE"] as const;
export type DashboardCommand = (typeof DASHBOARD_COMMANDS)[number];

export interface CommandResult {
  type: "COMMAND_RESULT";
  command: DashboardCommand;
  accepted: boolean;
  error?: string;
  status?: LeaderStatus;
}

/** The session operations dashboards can drive */
export interface DashboardTarget {
  startSession(cues?: readonly Cue[]): Promise<unknown>;
  stopSession(): Promise<void>;
  updateSchedule(cues: readonly Cue[]): Promise<boolean>;
  status(): LeaderStatus;
}

/**
 * Validate and run one dashboard command.
 */
export async function handleDashboardCommand(
  target: DashboardTarget,
  command: DashboardCommand,
  data: unknown
): Promise<CommandResult> {
  try {
    switch (command) {
      case "START_SESSION": {
        const parsed = StartSessionEventSchema.safeParse(data ?? {});
        if (!parsed.success) {
          return reject(command, formatZodError(parsed.error));
        }
        await target.startSession(parsed.data.cues);
        break;
      }
      case "STOP_SESSION":
        await target.stopSession();
        break;
      case "UPDATE_SCHEDULE": {
        const parsed = UpdateScheduleEventSchema.safeParse(data);
        if (!parsed.success) {
          return reject(command, formatZodError(parsed.error));
        }
        await target.updateSchedule(parsed.data.cues);
        break;
      }
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`[dashboard] ${command} failed: ${reason}`);
    return reject(command, reason);
  }

  return { type: "COMMAND_RESULT", command, accepted: true, status: target.status() };
}

function reject(command: DashboardCommand, error: string): CommandResult {
  console.log(`[dashboard] rejected ${command}: ${error}`);
  return { type: "COMMAND_RESULT", command, accepted: false, error };
}

/**
 * Register dashboard command handlers on a socket.
 */
export function registerDashboardHandlers(target: DashboardTarget, socket: Socket): void {
  for (const command of DASHBOARD_COMMANDS) {
    socket.on(command, (data: unknown) => {
      handleDashboardCommand(target, command, data)
        .then((result) => {
          socket.emit("COMMAND_RESULT", result);
        })
        .catch((err: unknown) => {
          console.error(`[dashboard] ${command} handler failed:`, err);
        });
    });
  }
}
