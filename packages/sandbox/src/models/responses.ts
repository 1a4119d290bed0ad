import { z } from 'zod';

const dataRecordSchema = z.record(z.unknown());

/** Payload of endpoints whose `data` is passed through untouched. */
export const dataEnvelopeSchema = z
  .object({ data: dataRecordSchema.default({}) })
  .transform((envelope) => envelope.data);

export type ResponseData = z.output<typeof dataEnvelopeSchema>;

export const analysisCreatedSchema = z
  .object({
    data: z.object({ taskid: z.string().min(1) }).passthrough(),
  })
  .transform(({ data }) => ({ taskId: data.taskid }));

export type AnalysisCreated = z.output<typeof analysisCreatedSchema>;

export const messageEnvelopeSchema = z
  .object({ message: z.string().default('') })
  .transform((envelope) => ({ message: envelope.message }));

export type MessageResponse = z.output<typeof messageEnvelopeSchema>;

export const taskProgressSchema = z
  .object({
    uuid: z.string(),
    /** Completion in percent. */
    status: z.number(),
    /** Seconds until the task finishes. */
    remaining: z.number(),
  })
  .passthrough();

/**
 * Shape of both the status endpoint's `data` and each status stream event.
 */
export const taskStatusUpdateSchema = z
  .object({
    task: taskProgressSchema.optional(),
    completed: z.boolean().default(false),
    error: z.boolean().default(false),
  })
  .passthrough();

export type TaskStatusUpdate = z.output<typeof taskStatusUpdateSchema>;

/** A task that finished or failed will send no further updates. */
export function isTerminalStatus(status: TaskStatusUpdate): boolean {
  return status.completed || status.error;
}

export const taskStatusEnvelopeSchema = z
  .object({ data: taskStatusUpdateSchema })
  .transform((envelope) => envelope.data);

export const monitorEventSchema = dataRecordSchema;
export type MonitorEvent = z.output<typeof monitorEventSchema>;

export const userPresetSchema = z
  .object({
    _id: z.string(),
    name: z.string(),
    userId: z.string().optional(),
    os: z.string().optional(),
    version: z.string().optional(),
    bitness: z.number().optional(),
    type: z.string().optional(),
    browser: z.string().optional(),
    locale: z.string().optional(),
    location: z.string().optional(),
    timeout: z.number().optional(),
    privacy: z.string().optional(),
  })
  .passthrough()
  .transform(({ _id, ...preset }) => ({ id: _id, ...preset }));

export type UserPreset = z.output<typeof userPresetSchema>;

/** The service answers with either a bare list or a `{ data }` envelope. */
export const userPresetsSchema = z
  .object({ data: z.array(userPresetSchema) })
  .transform((envelope) => envelope.data);
