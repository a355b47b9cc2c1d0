import assert from 'node:assert/strict'
import { test } from 'node:test'
import { loadConfig } from '../src/config'

test('loadConfig usa valores por defecto', () => {
  assert.deepEqual(loadConfig({}), {
    port: 3001,
    redis: { host: '127.0.0.1', port: 6379 },
    db: {
      host: '127.0.0.1',
      port: 5432,
      database: 'pathprobe_dev',
      user: 'user',
      password: 'password',
    },
    workerConcurrency: 5,
    probeTimeoutMs: 10000,
  })
})

test('loadConfig lee las variables de entorno', () => {
  const config = loadConfig({
    PORT: '8080',
    REDIS_HOST: 'redis',
    DB_NAME: 'scans',
    DB_PASSWORD: 'test-secret',
    WORKER_CONCURRENCY: '2',
    PROBE_TIMEOUT_MS: '2500',
  })
  assert.equal(config.port, 8080)
  assert.equal(config.redis.host, 'redis')
  assert.equal(config.db.database, 'scans')
  assert.equal(config.db.password, 'test-secret')
  assert.equal(config.workerConcurrency, 2)
  assert.equal(config.probeTimeoutMs, 2500)
})

test('loadConfig rechaza enteros inválidos', () => {
  assert.throws(() => loadConfig({ REDIS_PORT: 'abc' }), {
    message: 'Variable de entorno inválida REDIS_PORT=abc: se espera un entero positivo',
  })
})
