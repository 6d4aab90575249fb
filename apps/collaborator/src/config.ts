/**
 * Collaborator configuration from environment variables.
 */

import { z } from "zod";
import { CORRECTION, NETWORK, TIMING, formatZodError } from "@cuesync/shared";

const PortSchema = z.coerce.number().int().min(1).max(65535);
const SecondsSchema = z.coerce.number().positive();

const FlagSchema = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const CollaboratorEnvSchema = z
  .object({
    DEVICE_ID: z.string().min(1).max(64).default("collaborator-001"),
    SYNC_PORT: PortSchema.default(NETWORK.SYNC_PORT),
    CONTROL_PORT: PortSchema.default(NETWORK.CONTROL_PORT),
    BROADCAST_ADDRESS: z.string().ip({ version: "v4" }).default(NETWORK.BROADCAST_ADDRESS),
    /** Media reference reported on registration */
    MEDIA_FILE: z.string().default(""),
    /** Length of the simulated media; unset means no looping */
    MEDIA_DURATION_SEC: SecondsSchema.optional(),
    HEARTBEAT_INTERVAL_SEC: SecondsSchema.default(TIMING.HEARTBEAT_INTERVAL_SEC),
    SYNC_TIMEOUT_SEC: SecondsSchema.default(TIMING.SYNC_TIMEOUT_SEC),
    LOOP_THRESHOLD_SEC: SecondsSchema.default(TIMING.LOOP_THRESHOLD_SEC),
    DEVIATION_THRESHOLD_SEC: SecondsSchema.default(CORRECTION.DEVIATION_THRESHOLD_SEC),
    CORRECTION_COOLDOWN_SEC: z.coerce.number().nonnegative().default(CORRECTION.COOLDOWN_SEC),
    MIN_SAMPLES: z.coerce.number().int().min(1).default(CORRECTION.MIN_SAMPLES),
    MAX_SAMPLES: z.coerce.number().int().min(1).default(CORRECTION.MAX_SAMPLES),
    SAMPLE_INTERVAL_SEC: z.coerce.number().nonnegative().default(CORRECTION.SAMPLE_INTERVAL_SEC),
    /** Stop playback once the leader's clock has been silent for SYNC_TIMEOUT_SEC */
    STOP_ON_SYNC_LOSS: FlagSchema.default("false"),
    DEBUG: FlagSchema.default("false"),
  })
  .refine((vars) => vars.MIN_SAMPLES <= vars.MAX_SAMPLES, {
    message: "MIN_SAMPLES must not exceed MAX_SAMPLES",
    path: ["MIN_SAMPLES"],
  });

export interface CollaboratorConfig {
  deviceId: string;
  syncPort: number;
  controlPort: number;
  broadcastAddress: string;
  mediaRef: string;
  mediaDurationSec: number | null;
  heartbeatIntervalSec: number;
  syncTimeoutSec: number;
  loopThresholdSec: number;
  correction: {
    deviationThresholdSec: number;
    cooldownSec: number;
    minSamples: number;
    maxSamples: number;
  };
  sampleIntervalSec: number;
  stopOnSyncLoss: boolean;
  debug: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CollaboratorConfig {
  const result = CollaboratorEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid collaborator configuration: ${formatZodError(result.error)}`);
  }

  const vars = result.data;
  return {
    deviceId: vars.DEVICE_ID,
    syncPort: vars.SYNC_PORT,
    controlPort: vars.CONTROL_PORT,
    broadcastAddress: vars.BROADCAST_ADDRESS,
    mediaRef: vars.MEDIA_FILE,
    mediaDurationSec: vars.MEDIA_DURATION_SEC ?? null,
    heartbeatIntervalSec: vars.HEARTBEAT_INTERVAL_SEC,
    syncTimeoutSec: vars.SYNC_TIMEOUT_SEC,
    loopThresholdSec: vars.LOOP_THRESHOLD_SEC,
    correction: {
      deviationThresholdSec: vars.DEVIATION_THRESHOLD_SEC,
      cooldownSec: vars.CORRECTION_COOLDOWN_SEC,
      minSamples: vars.MIN_SAMPLES,
      maxSamples: vars.MAX_SAMPLES,
    },
    sampleIntervalSec: vars.SAMPLE_INTERVAL_SEC,
    stopOnSyncLoss: vars.STOP_ON_SYNC_LOSS,
    debug: vars.DEBUG,
  };
}
