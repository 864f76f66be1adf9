/**
 * Zod schemas for the subset of HAR 1.2 that the recorder reads back.
 * See http://www.softwareishard.com/blog/har-12-spec/
 */

import { z } from 'zod';

export const SUPPORTED_HAR_VERSIONS = ['1.1', '1.2'] as const;

const NameValueSchema = z.object({
  name: z.string(),
  value: z.string(),
});

const PostDataSchema = z.object({
  mimeType: z.string(),
  text: z.string().optional(),
  params: z.array(NameValueSchema).optional(),
  _encoding: z.literal('base64').optional(),
});

const RequestSchema = z.object({
  method: z.string().min(1),
  url: z.string().url(),
  httpVersion: z.string().optional(),
  cookies: z.array(NameValueSchema).optional(),
  headers: z.array(NameValueSchema),
  queryString: z.array(NameValueSchema).optional(),
  postData: PostDataSchema.optional(),
  headersSize: z.number().optional(),
  bodySize: z.number().optional(),
});

const ContentSchema = z.object({
  size: z.number(),
  mimeType: z.string().optional(),
  text: z.string().optional(),
  encoding: z.string().optional(),
});

const ResponseSchema = z.object({
  status: z.number().int(),
  statusText: z.string(),
  httpVersion: z.string().optional(),
  cookies: z.array(NameValueSchema).optional(),
  headers: z.array(NameValueSchema),
  content: ContentSchema,
  redirectURL: z.string().optional(),
  headersSize: z.number().optional(),
  bodySize: z.number().optional(),
});

const TimingsSchema = z.object({
  blocked: z.number().optional(),
  dns: z.number().optional(),
  connect: z.number().optional(),
  send: z.number(),
  wait: z.number(),
  receive: z.number(),
  ssl: z.number().optional(),
});

export const HarEntrySchema = z.object({
  startedDateTime: z.string().datetime({ offset: true }),
  time: z.number().nonnegative(),
  request: RequestSchema,
  response: ResponseSchema,
  cache: z.object({}).optional(),
  timings: TimingsSchema,
});

export const HarArchiveSchema = z.object({
  log: z.object({
    version: z.enum(SUPPORTED_HAR_VERSIONS),
    creator: z.object({
      name: z.string(),
      version: z.string(),
    }),
    entries: z.array(HarEntrySchema),
  }),
});

export type HarNameValue = z.infer<typeof NameValueSchema>;
export type HarPostData = z.infer<typeof PostDataSchema>;
export type HarContent = z.infer<typeof ContentSchema>;
export type HarEntry = z.infer<typeof HarEntrySchema>;
export type HarArchive = z.infer<typeof HarArchiveSchema>;
