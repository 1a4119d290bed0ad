import { z } from 'zod';

export const objectTypeSchema = z.enum(['file', 'url', 'download', 'rerun']);
export type ObjectType = z.infer<typeof objectTypeSchema>;

export const osTypeSchema = z.enum(['windows', 'linux']);
export type OSType = z.infer<typeof osTypeSchema>;

/** Linux and Windows 11 only run 64-bit images. */
export const bitnessSchema = z.enum(['32', '64']);
export type Bitness = z.infer<typeof bitnessSchema>;

export const windowsVersionSchema = z.enum(['7', '10', '11']);
export type WindowsVersion = z.infer<typeof windowsVersionSchema>;

export const linuxVersionSchema = z.enum(['22.04.2']);
export type LinuxVersion = z.infer<typeof linuxVersionSchema>;

export const envTypeSchema = z.enum(['clean', 'office', 'complete']);
export type EnvType = z.infer<typeof envTypeSchema>;

export const browserSchema = z.enum([
  'Google Chrome',
  'Mozilla Firefox',
  'Internet Explorer',
  'Microsoft Edge',
]);
export type Browser = z.infer<typeof browserSchema>;

export const privacyTypeSchema = z.enum(['public', 'bylink', 'owner', 'byteam']);
export type PrivacyType = z.infer<typeof privacyTypeSchema>;

/** `appdata`, `root` and `windows` exist on Windows images only. */
export const startFolderSchema = z.enum([
  'desktop',
  'downloads',
  'home',
  'temp',
  'appdata',
  'root',
  'windows',
]);
export type StartFolder = z.infer<typeof startFolderSchema>;
