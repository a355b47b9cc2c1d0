export interface BackendConfig {
  port: number;
  redis: { host: string; port: number };
  db: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
  };
  workerConcurrency: number;
  probeTimeoutMs: number;
}

function intFrom(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Variable de entorno inválida ${name}=${value}: se espera un entero positivo`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  return {
    port: intFrom(env.PORT, 3001, 'PORT'),
    redis: {
      host: env.REDIS_HOST || '127.0.0.1',
      port: intFrom(env.REDIS_PORT, 6379, 'REDIS_PORT'),
    },
    db: {
      host: env.DB_HOST || '127.0.0.1',
      port: intFrom(env.DB_PORT, 5432, 'DB_PORT'),
      database: env.DB_NAME || 'pathprobe_dev',
      user: env.DB_USER || 'user',
      password: env.DB_PASSWORD || 'password',
    },
    workerConcurrency: intFrom(env.WORKER_CONCURRENCY, 5, 'WORKER_CONCURRENCY'),
    probeTimeoutMs: intFrom(env.PROBE_TIMEOUT_MS, 10000, 'PROBE_TIMEOUT_MS'),
  };
}
