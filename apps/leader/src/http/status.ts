/**
 * Status surface for dashboards.
 *
 * Endpoints:
 * - GET /health - version, session state and collaborator counts
 * - GET /collaborators - registry snapshot keyed by collaborator id
 *
 * Connected socket.io dashboards also receive STATUS_SNAPSHOT every second.
 */

import type { IncomingMessage, ServerResponse } from "http";
import { VERSION, formatElapsed, type LeaderStatus } from "@cuesync/shared";
import { startPeriodicTask, type TaskHandle } from "@cuesync/net";

/** Anything that can report leader status */
export interface StatusSource {
  status(): LeaderStatus;
}

export interface StatusResponse {
  statusCode: number;
  body: unknown;
}

export const STATUS_SNAPSHOT_EVENT = "STATUS_SNAPSHOT";

const STATUS_FEED_INTERVAL_MS = 1000;

/**
 * Resolve a status request to a response. Unknown routes are 404,
 * non-GET methods on known routes 405.
 */
export function routeStatusRequest(
  method: string,
  url: string,
  source: StatusSource
): StatusResponse {
  const path = url.split("?")[0] ?? url;

  if (path !== "/health" && path !== "/collaborators") {
    return { statusCode: 404, body: { error: "Not found" } };
  }
  if (method !== "GET") {
    return { statusCode: 405, body: { error: "Method not allowed" } };
  }

  const status = source.status();

  if (path === "/collaborators") {
    return { statusCode: 200, body: status.collaborators };
  }

  return {
    statusCode: 200,
    body: {
      status: "ok",
      version: VERSION,
      leaderId: status.leaderId,
      running: status.session.isRunning,
      elapsed: formatElapsed(status.session.currentTime),
      cues: status.cueCount,
      collaborators: Object.keys(status.collaborators).length,
      online: status.onlineCount,
      stats: status.stats,
    },
  };
}

/**
 * Send JSON response.
 */
function sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
  res.writeHead(statusCode, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": "*",
  });
  res.end(JSON.stringify(data));
}

/** Node http request listener for the status routes */
export function createStatusRequestHandler(
  source: StatusSource
): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    const { statusCode, body } = routeStatusRequest(req.method ?? "GET", req.url ?? "/", source);
    sendJson(res, statusCode, body);
  };
}

/**
 * Push STATUS_SNAPSHOT through `publish` every second.
 * `publish` is typically `(event, payload) => io.emit(event, payload)`.
 */
export function startStatusFeed(
  source: StatusSource,
  publish: (event: string, payload: LeaderStatus) => void,
  intervalMs = STATUS_FEED_INTERVAL_MS
): TaskHandle {
  return startPeriodicTask("status-feed", intervalMs, () => {
    publish(STATUS_SNAPSHOT_EVENT, source.status());
  });
}
