// Logger global pour toute l'application
import pino from "pino";
import { LOG_LEVEL, LOG_FILE } from "./config";

const LEVELS: readonly pino.Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

function isLevel(value: string): value is pino.Level {
  return LEVELS.some(l => l === value);
}

// multistream filtre par stream (info par défaut) : on aligne sur LOG_LEVEL
const streamLevel: pino.Level = isLevel(LOG_LEVEL) ? LOG_LEVEL : "info";

// Console + fichier optionnel (LOG_FILE=mm.log)
const streams: pino.StreamEntry[] = [{ level: streamLevel, stream: process.stdout }];
if (LOG_FILE) {
  streams.push({
    level: streamLevel,
    stream: pino.destination({ dest: LOG_FILE, append: true, sync: false })
  });
}

export const rootLog = pino(
  {
    level: LOG_LEVEL,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.multistream(streams)
);

/**
 * Raccourcit un tokenId / orderId pour les logs
 */
export function shortId(id: string, length: number = 16): string {
  return id.length > length ? id.substring(0, length) + "..." : id;
}
