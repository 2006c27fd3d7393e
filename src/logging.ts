import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type ThresholdLevel = LogLevel | 'silent';

const THRESHOLDS: readonly ThresholdLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isThresholdLevel(value: unknown): value is ThresholdLevel {
  return typeof value === 'string' && (THRESHOLDS as readonly string[]).includes(value);
}

const envLevel = process.env.LOG_LEVEL;
let runtimeLevel: ThresholdLevel = isThresholdLevel(envLevel) ? envLevel : 'info';

// stdout carries the interactive transcript, so log lines go to stderr.
const logger = pino({ level: runtimeLevel }, pino.destination({ dest: 2, sync: true }));

type Entry = { level: LogLevel; msg: string; time: number };
const ring: Entry[] = [];
const RING_MAX = 500;

export function setLogLevel(level: ThresholdLevel) {
  runtimeLevel = level;
  logger.level = level;
}

export function getLogLevel() { return runtimeLevel; }

export function log(level: LogLevel, msg: string) {
  // The ring keeps everything so `logs` can show entries below the pino threshold.
  ring.push({ level, msg, time: Date.now() });
  if (ring.length > RING_MAX) ring.splice(0, ring.length - RING_MAX);
  logger[level](msg);
}

export function getLogs(since?: number) {
  return ring.filter(e => !since || e.time > since);
}
