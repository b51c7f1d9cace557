/**
 * Live snapshot of the host, for exporting or comparing against a stored file
 */

import * as os from "os";
import type { Snapshot } from "./types.js";

const MB = 1024 * 1024;

function toMegabytes(bytes: number): number {
  return Math.round((bytes / MB) * 100) / 100;
}

export function collectSystemSnapshot(): Snapshot {
  const cpus = os.cpus();

  return {
    OS: {
      platform: os.platform(),
      release: os.release(),
      arch: os.arch(),
      hostname: os.hostname(),
    },
    CPU: {
      model: cpus[0]?.model.trim() ?? "unknown",
      cores: cpus.length,
      speedMHz: cpus[0]?.speed ?? 0,
    },
    Memory: {
      totalMB: toMegabytes(os.totalmem()),
      freeMB: toMegabytes(os.freemem()),
    },
    Network: Object.entries(os.networkInterfaces()).map(([name, addresses]) => ({
      name,
      addresses: (addresses ?? []).map((address) => address.address),
    })),
  };
}
