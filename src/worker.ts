/**
 * Campaign Worker - Redis consumer entry point.
 *
 * Consumes tasks from the `campaigns:tasks` queue, runs a full campaign per
 * task, streams logs back via Redis Pub/Sub, and publishes the result.
 *
 * Task flow:
 *   LPUSH campaigns:tasks '{"task_id","tenant_id","key"}'
 *   HSET <key> target <target> [scope a,b] [targets 10.0.0.5,10.0.0.6]
 *   SUBSCRIBE logs:<tenant>:<task> complete:<tenant>:<task>
 *
 * Usage:
 *   npm run worker          # Build + run
 *   npm run worker:dev      # Run directly with tsx
 */

import 'dotenv/config';
import { Redis } from 'ioredis';
import { initTracing, shutdownTracing } from './agent/utils/index.js';
import { CampaignAgent } from './agent/index.js';
import type { CampaignResult, LogEntry } from './agent/core/types.js';
import { getErrorMessage } from './agent/core/errors.js';
import { loadRuntimeConfig, type RuntimeConfig } from './config/index.js';
import {
  TASK_QUEUE,
  completeChannel,
  logChannel,
  parseCampaignTask,
  parseTaskMessage,
} from './utils/task.js';

// ─── Redis Client Factory ────────────────────────────────────

function createRedisClient(
  config: RuntimeConfig['redis'],
  name: string
): InstanceType<typeof Redis> {
  const client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    maxRetriesPerRequest: null,
  });
  client.on('error', (err: Error) => console.error(`[redis:${name}]`, err.message));
  client.on('connect', () => console.log(`[redis:${name}] connected`));
  return client;
}

/**
 * Payload published to `complete:<tenant>:<task>` and stored in the task hash.
 */
function toTaskResult(result: CampaignResult) {
  return {
    session_id: result.sessionId,
    target: result.target,
    status: result.status,
    phases: result.phasesVisited,
    operations: result.summary.totalOperations,
    success_rate: result.summary.successRate,
    targets: result.summary.targetsIdentified,
    vulnerabilities: result.summary.totalVulnerabilities,
    compromised: result.summary.targetsCompromised,
    final_analysis: result.finalAnalysis ?? null,
    started_at: result.startedAt,
    completed_at: result.completedAt,
  };
}

// ─── Main Worker Loop ────────────────────────────────────────

async function main(): Promise<void> {
  console.log('Campaign Worker');
  console.log('===============');

  const config = loadRuntimeConfig();
  initTracing();

  const redis = createRedisClient(config.redis, 'worker');
  const blockingRedis = createRedisClient(config.redis, 'blocking');

  // Set per task; the agent's logger relays to whichever channel is current
  let currentLogChannel: string | null = null;
  const onLog = (entry: LogEntry): void => {
    if (!currentLogChannel) return;
    const line = `[${entry.level}][${entry.component}] ${entry.message}`;
    redis.publish(currentLogChannel, line).catch((err: unknown) => {
      console.error(`[worker] Log relay failed: ${getErrorMessage(err)}`);
    });
  };

  let activeTask: AbortController | null = null;

  console.log(`[worker] Listening on queue: ${TASK_QUEUE}`);
  console.log('[worker] Waiting for tasks... (Ctrl+C to stop)\n');

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\n[worker] Shutting down...');
    activeTask?.abort();
    await shutdownTracing();
    blockingRedis.disconnect();
    redis.disconnect();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  // ─── BRPOP Loop ──────────────────────────────────────────
  while (!shuttingDown) {
    const item = await blockingRedis.brpop(TASK_QUEUE, 0);
    if (!item) continue;

    const [, payload] = item;
    const message = parseTaskMessage(payload);
    if (!message) {
      console.error('[worker] Failed to parse task payload:', payload);
      continue;
    }

    const { task_id: taskId, tenant_id: tenantId, key: taskKey } = message;
    console.log(`[worker] Picked up task: ${taskId} (tenant: ${tenantId})`);

    const hash = await redis.hgetall(taskKey);
    const task = parseCampaignTask(hash);
    const completeTo = completeChannel(tenantId, taskId);
    if (!task) {
      console.error(`[worker] Task hash at ${taskKey} has no target, skipping`);
      continue;
    }

    console.log(`[worker] Target: ${task.target}, scope: ${task.scope.join(', ') || 'full'}`);

    // Fresh registry and log per task
    const agent = new CampaignAgent(config, { onLog });
    for (const ip of task.seedTargets) {
      agent.context.registry.add(ip);
    }

    currentLogChannel = logChannel(tenantId, taskId);
    activeTask = new AbortController();
    await redis.hset(taskKey, 'state', 'running');

    try {
      const result = toTaskResult(
        await agent.campaign(task.target, { scope: task.scope, signal: activeTask.signal })
      );

      // Atomic update + publish
      const pipeline = redis.pipeline();
      pipeline.hset(taskKey, 'state', 'completed');
      pipeline.hset(taskKey, 'session_id', result.session_id);
      pipeline.hset(taskKey, 'result', JSON.stringify(result));
      await pipeline.exec();

      await redis.publish(completeTo, JSON.stringify(result));
      console.log(`[worker] Task ${taskId} state -> completed`);
    } catch (error: unknown) {
      const errorMessage = getErrorMessage(error);
      console.error(`[worker] Task ${taskId} failed: ${errorMessage}`);

      const pipeline = redis.pipeline();
      pipeline.hset(taskKey, 'state', 'failed');
      pipeline.hset(taskKey, 'error', errorMessage);
      await pipeline.exec();

      await redis.publish(
        completeTo,
        JSON.stringify({ error: errorMessage, completed_at: new Date().toISOString() })
      );
    } finally {
      currentLogChannel = null;
      activeTask = null;
    }

    console.log(`[worker] Done with task ${taskId}\n`);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
