import { z } from 'zod';

export const TaskStatusSchema = z.enum(['pending', 'completed', 'deleted', 'waiting', 'recurring']);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const PrioritySchema = z.enum(['H', 'M', 'L']);
export type Priority = z.infer<typeof PrioritySchema>;

export interface Annotation {
  entry?: Date;
  description: string;
}

export interface Task {
  /** Working-set id. Absent for completed and deleted tasks. */
  id?: number;
  uuid: string;
  description: string;
  project?: string;
  tags: string[];
  priority?: Priority;
  status: TaskStatus;
  due?: Date;
  scheduled?: Date;
  wait?: Date;
  /** Set while the task is being worked on. */
  start?: Date;
  entry?: Date;
  modified?: Date;
  end?: Date;
  depends: string[];
  annotations: Annotation[];
  /** User-defined attributes, stringified. */
  udas: Record<string, string>;
  urgency: number;
}

export interface ProjectSummary {
  /** Full dotted name, e.g. `home.garden`. */
  name: string;
  percentage: number;
}

export interface TaskGroup {
  name: string;
  count: number;
  tasks: Task[];
  /** Completion percentage; project groups only, when the backend reported one. */
  percentage?: number;
  depth: number;
}

export const SortMethodSchema = z.enum([
  'alphabetic',
  'alpha',
  'description',
  'due',
  'scheduled',
  'created',
  'entry',
  'modified',
  'urgency',
]);
export type SortMethod = z.infer<typeof SortMethodSchema>;

export interface Section {
  name: string;
  filter: string;
  sort?: SortMethod;
  reverse?: boolean;
}
