import dotenv from "dotenv";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";

// Load environment variables from .env.local
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const envPath = resolve(__dirname, "../.env.local");
dotenv.config({ path: envPath });

import { createServer } from "http";
import { Server } from "socket.io";
import { VERSION } from "@cuesync/shared";
import { UdpTransport } from "@cuesync/net";
import { loadConfig } from "./config.js";
import { LeaderSession } from "./session/leader.js";
import { loadScheduleFile } from "./schedule/loader.js";
import {
  STATUS_SNAPSHOT_EVENT,
  createStatusRequestHandler,
  startStatusFeed,
} from "./http/status.js";
import { registerDashboardHandlers } from "./http/dashboard.js";

const config = loadConfig();

const session = new LeaderSession({
  leaderId: config.leaderId,
  clockTransport: new UdpTransport("clock-udp"),
  controlTransport: new UdpTransport("command-udp"),
  syncPort: config.syncPort,
  controlPort: config.controlPort,
  broadcastAddress: config.broadcastAddress,
  tickIntervalSec: config.tickIntervalSec,
  livenessTimeoutSec: config.livenessTimeoutSec,
  debugMode: config.debug,
});

const httpServer = createServer(createStatusRequestHandler(session));

const io = new Server(httpServer, {
  cors: {
    origin: "*",
    methods: ["GET", "POST"],
  },
  pingInterval: 10000,
  pingTimeout: 5000,
});

io.on("connection", (socket) => {
  console.log(`[connect] socket=${socket.id}`);
  socket.emit(STATUS_SNAPSHOT_EVENT, session.status());
  registerDashboardHandlers(session, socket);
});

const statusFeed = startStatusFeed(session, (event, payload) => {
  io.emit(event, payload);
});

async function main(): Promise<void> {
  await session.open();

  if (config.scheduleFile) {
    session.loadSchedule(await loadScheduleFile(config.scheduleFile));
  }

  await new Promise<void>((resolveListen) => {
    httpServer.listen(config.statusPort, () => resolveListen());
  });
  console.log(`[leader] status server listening on port ${config.statusPort}`);
  console.log(`[leader] shared package version: ${VERSION}`);

  if (config.autoStart) {
    await session.startSession();
  }
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.log(`[leader] ${signal} received, shutting down`);

  await statusFeed.stop();
  await session.close();
  await new Promise<void>((resolveClose) => {
    io.close(() => resolveClose());
  });
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[leader] shutdown failed:", err);
        process.exit(1);
      });
  });
}

main().catch((err: unknown) => {
  console.error("[leader] failed to start:", err);
  process.exit(1);
});
