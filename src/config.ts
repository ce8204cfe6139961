import { z } from 'zod';
import { ConfigError } from './errors';

const milliseconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z
  .object({
    SUPERVISOR_CHECK_INTERVAL_MS: milliseconds(5000),
    SUPERVISOR_HEARTBEAT_INTERVAL_MS: milliseconds(1000),
    SUPERVISOR_HEARTBEAT_SLOW_MS: milliseconds(5000),
    SUPERVISOR_HEARTBEAT_DEAD_MS: milliseconds(15000),
    SUPERVISOR_MAX_RESTARTS: z.coerce.number().int().nonnegative().default(3),
    SUPERVISOR_RESTART_WINDOW_MS: z.coerce.number().int().nonnegative().default(0),
    SUPERVISOR_AUTO_RESTART: flag(true),
    SUPERVISOR_CALL_TIMEOUT_MS: milliseconds(5000),
    SUPERVISOR_INBOX_CAPACITY: z.coerce.number().int().positive().default(1000),
    SUPERVISOR_STARTUP_GRACE_MS: milliseconds(5000),
    SUPERVISOR_DRAIN_TIMEOUT_MS: milliseconds(5000),
    SUPERVISOR_ISOLATION: z.enum(['worker', 'in-process']).default('worker'),
    SUPERVISOR_HEALTH_PORT: z
      .union([z.literal('off'), z.coerce.number().int().min(0).max(65535)])
      .default(3000),
  })
  .refine((env) => env.SUPERVISOR_HEARTBEAT_SLOW_MS < env.SUPERVISOR_HEARTBEAT_DEAD_MS, {
    message: 'SUPERVISOR_HEARTBEAT_SLOW_MS must be lower than SUPERVISOR_HEARTBEAT_DEAD_MS',
    path: ['SUPERVISOR_HEARTBEAT_SLOW_MS'],
  })
  .refine((env) => env.SUPERVISOR_HEARTBEAT_INTERVAL_MS < env.SUPERVISOR_HEARTBEAT_SLOW_MS, {
    message: 'SUPERVISOR_HEARTBEAT_INTERVAL_MS must be lower than SUPERVISOR_HEARTBEAT_SLOW_MS',
    path: ['SUPERVISOR_HEARTBEAT_INTERVAL_MS'],
  });

/**
 * Tunables of the supervisor runtime. Each one can be set independently.
 */
export interface SupervisorConfig {
  checkIntervalMs: number;
  heartbeatIntervalMs: number;
  heartbeatSlowMs: number;
  heartbeatDeadMs: number;
  maxRestarts: number;
  restartWindowMs: number;
  autoRestart: boolean;
  callTimeoutMs: number;
  inboxCapacity: number;
  startupGraceMs: number;
  drainTimeoutMs: number;
  isolation: 'worker' | 'in-process';
  /** `null` disables the health check server. */
  healthPort: number | null;
}

/**
 * Read the configuration from environment variables, falling back to
 * defaults for anything unset.
 * @throws ConfigError listing every invalid variable
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env): SupervisorConfig => {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = envSchema.safeParse(present);

  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid supervisor configuration: ${details.join('; ')}`);
  }

  const parsed = result.data;
  return {
    checkIntervalMs: parsed.SUPERVISOR_CHECK_INTERVAL_MS,
    heartbeatIntervalMs: parsed.SUPERVISOR_HEARTBEAT_INTERVAL_MS,
    heartbeatSlowMs: parsed.SUPERVISOR_HEARTBEAT_SLOW_MS,
    heartbeatDeadMs: parsed.SUPERVISOR_HEARTBEAT_DEAD_MS,
    maxRestarts: parsed.SUPERVISOR_MAX_RESTARTS,
    restartWindowMs: parsed.SUPERVISOR_RESTART_WINDOW_MS,
    autoRestart: parsed.SUPERVISOR_AUTO_RESTART,
    callTimeoutMs: parsed.SUPERVISOR_CALL_TIMEOUT_MS,
    inboxCapacity: parsed.SUPERVISOR_INBOX_CAPACITY,
    startupGraceMs: parsed.SUPERVISOR_STARTUP_GRACE_MS,
    drainTimeoutMs: parsed.SUPERVISOR_DRAIN_TIMEOUT_MS,
    isolation: parsed.SUPERVISOR_ISOLATION,
    healthPort: parsed.SUPERVISOR_HEALTH_PORT === 'off' ? null : parsed.SUPERVISOR_HEALTH_PORT,
  };
};
