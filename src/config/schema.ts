import { z } from 'zod';

export const LOG_LEVELS = ['Critical', 'Error', 'Warning', 'Info', 'Debug'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export const STORAGE_TYPES = ['local'] as const;
export type StorageType = (typeof STORAGE_TYPES)[number];

// Spellings accepted for booleans, case-insensitive
const BOOLEAN_STATES = new Map<string, boolean>([
  ['1', true],
  ['yes', true],
  ['true', true],
  ['on', true],
  ['0', false],
  ['no', false],
  ['false', false],
  ['off', false],
]);

const booleanLike = z.string().transform((value, ctx) => {
  const state = BOOLEAN_STATES.get(value.trim().toLowerCase());
  if (state === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected yes/no, got "${value}"`, fatal: true });
    return z.NEVER;
  }
  return state;
});

const integer = (min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'Expected an integer')
    .transform(Number)
    .pipe(z.number().int().min(min).max(max));

const wordList = z
  .string()
  .default('')
  .transform((value) => value.split(/\s+/).filter((word) => word.length > 0));

// Extensions are compared lowercase with their leading dot
const extensionList = wordList.transform((words) =>
  words.map((word) => (word.startsWith('.') ? word : `.${word}`).toLowerCase())
);

const url = z
  .string()
  .trim()
  .url()
  .transform((value) => value.replace(/\/+$/, ''));

const filePath = z.string().trim().min(1, 'Path must not be empty');

export const configSchema = z.object({
  general: z.object({
    storagetype: z.enum(STORAGE_TYPES),
    port: integer(1, 65535),
    nonofficetypes: extensionList,
    loglevel: z.enum(LOG_LEVELS),
    tokenvalidity: integer(1).default('86400'),
    locktimeout: integer(1).default('1800'),
    allowedclients: wordList,
    downloadurl: url.optional(),
    wopiurl: url.optional(),
    logfile: filePath.optional(),
  }),
  security: z
    .object({
      usehttps: booleanLike.default('no'),
      wopisecretfile: filePath,
      iopsecretfile: filePath,
      wopicert: filePath.optional(),
      wopikey: filePath.optional(),
    })
    .superRefine((security, ctx) => {
      if (!security.usehttps) return;
      if (!security.wopicert) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['wopicert'], message: 'Required when usehttps is enabled' });
      }
      if (!security.wopikey) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['wopikey'], message: 'Required when usehttps is enabled' });
      }
    }),
  local: z.object({
    storagehomepath: filePath,
  }),
  io: z
    .object({
      chunksize: integer(1).default('4194304'),
      maxfilesize: integer(1).default('104857600'),
    })
    .default({}),
});

export type ServerConfig = z.output<typeof configSchema>;
