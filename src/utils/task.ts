// Queue task parsing for the Redis worker

import { z } from 'zod';

export const TASK_QUEUE = 'campaigns:tasks';

const TaskMessageSchema = z.object({
  task_id: z.string().min(1),
  tenant_id: z.string().min(1),
  key: z.string().min(1),
});

export type TaskMessage = z.infer<typeof TaskMessageSchema>;

export interface CampaignTask {
  target: string;
  scope: string[];
  /** Addresses registered before the campaign starts */
  seedTargets: string[];
}

/**
 * Parses a BRPOP payload. Returns null for anything that is not a task message.
 */
export function parseTaskMessage(payload: string): TaskMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return null;
  }
  const parsed = TaskMessageSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Reads the task hash fields. Returns null when no target is set.
 */
export function parseCampaignTask(hash: Record<string, string>): CampaignTask | null {
  const target = hash.target?.trim();
  if (!target) return null;
  return {
    target,
    scope: splitList(hash.scope),
    seedTargets: splitList(hash.targets),
  };
}

export function logChannel(tenantId: string, taskId: string): string {
  return `logs:${tenantId}:${taskId}`;
}

export function completeChannel(tenantId: string, taskId: string): string {
  return `complete:${tenantId}:${taskId}`;
}
