import { Blob } from 'node:buffer';
import type { RequestBody } from '@sandbox-kit/core';
import { FormData } from 'undici';
import { z } from 'zod';
import {
  bitnessSchema,
  browserSchema,
  envTypeSchema,
  osTypeSchema,
  privacyTypeSchema,
  startFolderSchema,
} from './enums.js';

/** Upload name used when neither a path nor a filename is given. */
export const DEFAULT_FILENAME = 'malware.exe';

export const MAX_USER_TAGS = 8;
export const MAX_USER_TAG_LENGTH = 16;

const userTagSchema = z
  .string()
  .min(1, 'Tags must not be empty')
  .max(MAX_USER_TAG_LENGTH, `Tags are limited to ${MAX_USER_TAG_LENGTH} characters`)
  .regex(/^[a-zA-Z0-9-]+$/, 'Tags may only contain letters, digits and hyphens');

const extTextSchema = z.string().min(2).max(256);

/**
 * Options shared by every kind of submission. Anything left unset is omitted
 * from the request and the service applies its own default.
 */
export const analysisOptionsSchema = z
  .object({
    envOs: osTypeSchema.optional(),
    envVersion: z.string().min(1).optional(),
    envBitness: bitnessSchema.optional(),
    envType: envTypeSchema.optional(),
    envLocale: z.string().min(1).optional(),

    /** Command line passed to the object. Windows only. */
    cmd: extTextSchema.optional(),
    browser: browserSchema.optional(),
    /** User agent used to fetch `download` objects. */
    userAgent: extTextSchema.optional(),
    elevatePrompt: z.boolean().optional(),
    forceElevation: z.boolean().optional(),
    autoConfirmUac: z.boolean().optional(),
    runAsRoot: z.boolean().optional(),
    extension: z.boolean().optional(),
    startFolder: startFolderSchema.optional(),

    networkConnect: z.boolean().optional(),
    networkFakenet: z.boolean().optional(),
    networkTor: z.boolean().optional(),
    networkMitm: z.boolean().optional(),

    privacyType: privacyTypeSchema.optional(),
    hideSource: z.boolean().optional(),

    chatgpt: z.boolean().optional(),
    automatedInteractivity: z.boolean().optional(),

    userTags: z
      .array(userTagSchema)
      .max(MAX_USER_TAGS, `At most ${MAX_USER_TAGS} tags are allowed`)
      .optional(),
  })
  .strict();

const fileSchema = z.custom<Uint8Array>(
  (value) => value instanceof Uint8Array && value.byteLength > 0,
  'File contents must be non-empty bytes',
);

export const analysisRequestSchema = z.discriminatedUnion('objType', [
  analysisOptionsSchema.extend({
    objType: z.literal('file'),
    file: fileSchema,
    filename: z.string().min(1).default(DEFAULT_FILENAME),
  }),
  analysisOptionsSchema.extend({
    objType: z.literal('url'),
    url: z.string().url(),
  }),
  analysisOptionsSchema.extend({
    objType: z.literal('download'),
    url: z.string().url(),
  }),
  analysisOptionsSchema.extend({
    objType: z.literal('rerun'),
    taskRerunUuid: z.string().min(1),
  }),
]);

export type AnalysisOptions = z.input<typeof analysisOptionsSchema>;
export type AnalysisRequest = z.input<typeof analysisRequestSchema>;
export type ParsedAnalysisRequest = z.output<typeof analysisRequestSchema>;

export const listAnalysesSchema = z
  .object({
    /** Team history instead of the caller's own. */
    team: z.boolean().default(false),
    skip: z.number().int().min(0).default(0),
    limit: z.number().int().min(1).max(100).default(25),
  })
  .strict();

export type ListAnalysesRequest = z.input<typeof listAnalysesSchema>;

type OptionKey = keyof z.output<typeof analysisOptionsSchema>;

const WIRE_NAMES = {
  envOs: 'env_os',
  envVersion: 'env_version',
  envBitness: 'env_bitness',
  envType: 'env_type',
  envLocale: 'env_locale',
  cmd: 'obj_ext_cmd',
  browser: 'obj_ext_browser',
  userAgent: 'obj_ext_useragent',
  elevatePrompt: 'obj_ext_elevateprompt',
  forceElevation: 'obj_force_elevation',
  autoConfirmUac: 'auto_confirm_uac',
  runAsRoot: 'run_as_root',
  extension: 'obj_ext_extension',
  startFolder: 'obj_ext_startfolder',
  networkConnect: 'opt_network_connect',
  networkFakenet: 'opt_network_fakenet',
  networkTor: 'opt_network_tor',
  networkMitm: 'opt_network_mitm',
  privacyType: 'opt_privacy_type',
  hideSource: 'opt_privacy_hidesource',
  chatgpt: 'opt_chatgpt',
  automatedInteractivity: 'opt_automated_interactivity',
  userTags: 'user_tags',
} as const satisfies Record<OptionKey, string>;

/**
 * Flattens a validated request into the service's field names. Tags are
 * sent comma-separated.
 */
export function toWireFields(
  request: ParsedAnalysisRequest,
): Record<string, string | boolean> {
  const fields: Record<string, string | boolean> = {
    obj_type: request.objType,
  };

  for (const key of analysisOptionsSchema.keyof().options) {
    if (key === 'userTags') {
      if (request.userTags && request.userTags.length > 0) {
        fields[WIRE_NAMES.userTags] = request.userTags.join(',');
      }
      continue;
    }
    const value = request[key];
    if (value !== undefined) {
      fields[WIRE_NAMES[key]] = value;
    }
  }

  switch (request.objType) {
    case 'url':
    case 'download':
      fields['obj_url'] = request.url;
      break;
    case 'rerun':
      fields['task_rerun_uuid'] = request.taskRerunUuid;
      break;
    case 'file':
      break;
  }
  return fields;
}

/**
 * Files go up as multipart form data; every other submission is JSON.
 */
export function toRequestBody(request: ParsedAnalysisRequest): RequestBody {
  const fields = toWireFields(request);
  if (request.objType !== 'file') {
    return { type: 'json', value: fields };
  }

  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, String(value));
  }
  form.append('file', new Blob([request.file]), request.filename);
  return { type: 'form', value: form };
}
