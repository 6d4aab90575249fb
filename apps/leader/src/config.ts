/**
 * Leader configuration from environment variables.
 *
 * Variables (all optional):
 * - LEADER_ID             id carried on every sync tick (default "leader-001")
 * - SYNC_PORT             clock channel port (default 5005)
 * - CONTROL_PORT          control channel port (default 5006)
 * - BROADCAST_ADDRESS     IPv4 broadcast address (default 255.255.255.255)
 * - TICK_INTERVAL_SEC     seconds between sync ticks (default 0.1)
 * - LIVENESS_TIMEOUT_SEC  silence before a collaborator is offline (default 10)
 * - STATUS_PORT           HTTP + socket.io status port (default 3001)
 * - SCHEDULE_FILE         JSON cue list loaded at startup
 * - AUTO_START            start a session once the schedule is loaded (default true)
 * - DEBUG                 ask collaborators for debug output (default false)
 */

import { z } from "zod";
import { NETWORK, TIMING, formatZodError } from "@cuesync/shared";

const PortSchema = z.coerce.number().int().min(1).max(65535);

const FlagSchema = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const LeaderEnvSchema = z.object({
  LEADER_ID: z.string().min(1).max(64).default("leader-001"),
  SYNC_PORT: PortSchema.default(NETWORK.SYNC_PORT),
  CONTROL_PORT: PortSchema.default(NETWORK.CONTROL_PORT),
  BROADCAST_ADDRESS: z.string().ip({ version: "v4" }).default(NETWORK.BROADCAST_ADDRESS),
  TICK_INTERVAL_SEC: z.coerce.number().positive().default(TIMING.TICK_INTERVAL_SEC),
  LIVENESS_TIMEOUT_SEC: z.coerce.number().positive().default(TIMING.LIVENESS_TIMEOUT_SEC),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  SCHEDULE_FILE: z.string().min(1).optional(),
  AUTO_START: FlagSchema.default("true"),
  DEBUG: FlagSchema.default("false"),
});

export interface LeaderConfig {
  leaderId: string;
  syncPort: number;
  controlPort: number;
  broadcastAddress: string;
  tickIntervalSec: number;
  livenessTimeoutSec: number;
  statusPort: number;
  scheduleFile: string | null;
  autoStart: boolean;
  debug: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Parse leader settings from an environment map.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LeaderConfig {
  const result = LeaderEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid leader configuration: ${formatZodError(result.error)}`);
  }

  const vars = result.data;
  return {
    leaderId: vars.LEADER_ID,
    syncPort: vars.SYNC_PORT,
    controlPort: vars.CONTROL_PORT,
    broadcastAddress: vars.BROADCAST_ADDRESS,
    tickIntervalSec: vars.TICK_INTERVAL_SEC,
    livenessTimeoutSec: vars.LIVENESS_TIMEOUT_SEC,
    statusPort: vars.STATUS_PORT,
    scheduleFile: vars.SCHEDULE_FILE ?? null,
    autoStart: vars.AUTO_START,
    debug: vars.DEBUG,
  };
}
