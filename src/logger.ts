import pino from 'pino';

// Three-tier log levels:
//   minimal  → warn  (startup failures, rejected webhooks)
//   debug    → info  (default: startup summary, room joins)
//   verbose  → debug (everything: per-event resolution, alias lookups)

export type LogTier = 'minimal' | 'debug' | 'verbose';

// Read before config loads so config errors themselves are logged at the right level.
function resolveLogTier(): LogTier {
  const explicit = process.env.RELAYBOT_LOG_LEVEL?.toLowerCase();
  if (explicit === 'minimal' || explicit === 'debug' || explicit === 'verbose') return explicit;
  if (process.argv.includes('--verbose')) return 'verbose';
  return 'debug';
}

function tierToPinoLevel(tier: LogTier): string {
  return tier === 'minimal' ? 'warn' : tier === 'verbose' ? 'debug' : 'info';
}

export const logTier: LogTier = resolveLogTier();

// stderr, so command output on stdout stays pipeable
export const logger = pino(
  {
    name: 'relaybot',
    level: tierToPinoLevel(logTier),
    redact: {
      paths: ['password', 'secret', '*.password', '*.secret'],
      censor: '[redacted]',
    },
  },
  pino.destination({ dest: 2, sync: true }),
);
