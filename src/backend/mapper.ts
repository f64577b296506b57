import { z } from 'zod';
import { PrioritySchema, TaskStatusSchema, type Annotation, type Task } from '../schema/index.js';
import { parseTaskwarriorDate } from '../core/date-utils.js';

const RawAnnotationSchema = z.object({
  entry: z.string().optional(),
  description: z.string(),
});

export const RawTaskSchema = z
  .object({
    id: z.number().optional(),
    uuid: z.string(),
    description: z.string(),
    project: z.string().optional(),
    tags: z.array(z.string()).optional(),
    priority: z.string().optional(),
    status: TaskStatusSchema,
    due: z.string().optional(),
    scheduled: z.string().optional(),
    wait: z.string().optional(),
    start: z.string().optional(),
    entry: z.string().optional(),
    modified: z.string().optional(),
    end: z.string().optional(),
    depends: z.union([z.array(z.string()), z.string()]).optional(),
    annotations: z.array(RawAnnotationSchema).optional(),
    urgency: z.number().optional(),
  })
  .passthrough();

export type RawTask = z.infer<typeof RawTaskSchema>;

const KNOWN_KEYS = new Set([
  'id',
  'uuid',
  'description',
  'project',
  'tags',
  'priority',
  'status',
  'due',
  'scheduled',
  'wait',
  'start',
  'entry',
  'modified',
  'end',
  'depends',
  'annotations',
  'urgency',
  // internal recurrence bookkeeping
  'mask',
  'imask',
]);

function toDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  return parseTaskwarriorDate(value) ?? undefined;
}

function toDepends(value: RawTask['depends']): string[] {
  if (value === undefined) return [];
  if (Array.isArray(value)) return value;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function collectUdas(raw: Record<string, unknown>): Record<string, string> {
  const udas: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (KNOWN_KEYS.has(key)) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      udas[key] = String(value);
    }
  }
  return udas;
}

export function mapRawTask(raw: RawTask): Task {
  const priority = PrioritySchema.safeParse(raw.priority);
  const annotations: Annotation[] = (raw.annotations ?? []).map((a) => {
    const entry = toDate(a.entry);
    return entry ? { entry, description: a.description } : { description: a.description };
  });

  const task: Task = {
    uuid: raw.uuid,
    description: raw.description,
    tags: raw.tags ?? [],
    status: raw.status,
    depends: toDepends(raw.depends),
    annotations,
    udas: collectUdas(raw),
    urgency: raw.urgency ?? 0,
  };
  // Pending tasks carry a working-set id; 0 means "none".
  if (raw.id !== undefined && raw.id > 0) task.id = raw.id;
  if (raw.project) task.project = raw.project;
  if (priority.success) task.priority = priority.data;
  task.due = toDate(raw.due);
  task.scheduled = toDate(raw.scheduled);
  task.wait = toDate(raw.wait);
  task.start = toDate(raw.start);
  task.entry = toDate(raw.entry);
  task.modified = toDate(raw.modified);
  task.end = toDate(raw.end);
  return task;
}

/**
 * Parses the output of `task export`. Blank output means no matches.
 */
export function parseExport(output: string): Task[] {
  const trimmed = output.trim();
  if (trimmed === '') return [];
  const json: unknown = JSON.parse(trimmed);
  return z.array(RawTaskSchema).parse(json).map(mapRawTask);
}
