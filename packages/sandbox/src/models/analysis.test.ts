import { describe, it, expect } from 'vitest';
import {
  analysisRequestSchema,
  listAnalysesSchema,
  toRequestBody,
  toWireFields,
} from './analysis.js';

describe('analysis request models', () => {
  it('defaults the upload name', () => {
    const parsed = analysisRequestSchema.parse({
      objType: 'file',
      file: new Uint8Array([1]),
    });

    expect(parsed.objType === 'file' && parsed.filename).toBe('malware.exe');
  });

  it('rejects unknown options', () => {
    const result = analysisRequestSchema.safeParse({
      objType: 'url',
      url: 'https://example.com',
      envOS: 'windows',
    });

    expect(result.success).toBe(false);
  });

  it('rejects an unknown object type', () => {
    const result = analysisRequestSchema.safeParse({ objType: 'email' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.path).toEqual(['objType']);
  });

  it('maps options onto wire field names', () => {
    const parsed = analysisRequestSchema.parse({
      objType: 'url',
      url: 'https://example.com',
      startFolder: 'downloads',
      hideSource: true,
      automatedInteractivity: false,
      userTags: [],
    });

    expect(toWireFields(parsed)).toEqual({
      obj_type: 'url',
      obj_url: 'https://example.com',
      obj_ext_startfolder: 'downloads',
      opt_privacy_hidesource: true,
      opt_automated_interactivity: false,
    });
  });

  it('sends non-file submissions as JSON', () => {
    const parsed = analysisRequestSchema.parse({
      objType: 'rerun',
      taskRerunUuid: 'task-0',
    });

    expect(toRequestBody(parsed)).toEqual({
      type: 'json',
      value: { obj_type: 'rerun', task_rerun_uuid: 'task-0' },
    });
  });

  it('stringifies form fields for file uploads', () => {
    const parsed = analysisRequestSchema.parse({
      objType: 'file',
      file: new Uint8Array([1, 2]),
      runAsRoot: true,
    });

    const body = toRequestBody(parsed);

    if (body.type !== 'form') {
      throw new Error('expected a form body');
    }
    expect(body.value.get('run_as_root')).toBe('true');
    expect(body.value.has('obj_url')).toBe(false);
  });

  it('applies list defaults', () => {
    expect(listAnalysesSchema.parse({})).toEqual({ team: false, skip: 0, limit: 25 });
  });
});
