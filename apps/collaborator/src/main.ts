import dotenv from "dotenv";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";

// Load environment variables from .env.local
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const envPath = resolve(__dirname, "../.env.local");
dotenv.config({ path: envPath });

import { VERSION } from "@cuesync/shared";
import { UdpTransport } from "@cuesync/net";
import { loadConfig } from "./config.js";
import { CollaboratorSession } from "./session/collaborator.js";
import { SimulatedPlayer } from "./media/simulated.js";
import { ConsoleTriggerOutput } from "./triggers/console.js";

const config = loadConfig();

const session = new CollaboratorSession({
  deviceId: config.deviceId,
  syncTransport: new UdpTransport("sync-udp"),
  controlTransport: new UdpTransport("command-udp"),
  player: new SimulatedPlayer({ durationSec: config.mediaDurationSec }),
  output: new ConsoleTriggerOutput(),
  mediaRef: config.mediaRef,
  syncPort: config.syncPort,
  controlPort: config.controlPort,
  broadcastAddress: config.broadcastAddress,
  heartbeatIntervalSec: config.heartbeatIntervalSec,
  syncTimeoutSec: config.syncTimeoutSec,
  sampleIntervalSec: config.sampleIntervalSec,
  loopThresholdSec: config.loopThresholdSec,
  correction: config.correction,
  debugMode: config.debug,
  stopOnSyncLoss: config.stopOnSyncLoss,
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.log(`[collaborator] ${signal} received, shutting down`);
  await session.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[collaborator] shutdown failed:", err);
        process.exit(1);
      });
  });
}

session
  .open()
  .then(() => {
    console.log(`[collaborator] shared package version: ${VERSION}`);
  })
  .catch((err: unknown) => {
    console.error("[collaborator] failed to start:", err);
    process.exit(1);
  });
