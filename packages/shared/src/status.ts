/**
 * Status payloads the leader publishes to dashboards.
 */

import { z } from "zod";
import { SessionStateSchema, SessionStatsSchema } from "./state.js";

export const CollaboratorStatusSchema = z.object({
  id: z.string(),
  address: z.string(),
  status: z.string(),
  mediaRef: z.string(),
  /** Epoch seconds */
  lastSeen: z.number(),
  registeredAt: z.number(),
  online: z.boolean(),
  secondsSinceSeen: z.number().nonnegative(),
});
export type CollaboratorStatus = z.infer<typeof CollaboratorStatusSchema>;

export const LeaderStatusSchema = z.object({
  leaderId: z.string(),
  session: SessionStateSchema,
  stats: SessionStatsSchema,
  cueCount: z.number().int().nonnegative(),
  collaborators: z.record(CollaboratorStatusSchema),
  onlineCount: z.number().int().nonnegative(),
});
export type LeaderStatus = z.infer<typeof LeaderStatusSchema>;
