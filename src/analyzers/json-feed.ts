/**
 * JSON Feed 1.0 / 1.1 schema
 *
 * https://jsonfeed.org/version/1.1
 */

import { z } from 'zod';

export const JSON_FEED_VERSION_PREFIX = 'https://jsonfeed.org/version/';

const JsonFeedAuthorSchema = z.object({
  name: z.string().optional(),
  url: z.string().optional(),
  avatar: z.string().optional(),
});

export const JsonFeedItemSchema = z.object({
  // 1.0 feeds in the wild sometimes use numeric ids
  id: z.union([z.string(), z.number()]).transform(String).optional(),
  url: z.string().optional(),
  external_url: z.string().optional(),
  title: z.string().optional(),
  content_html: z.string().optional(),
  content_text: z.string().optional(),
  summary: z.string().optional(),
  date_published: z.string().optional(),
  date_modified: z.string().optional(),
  authors: z.array(JsonFeedAuthorSchema).optional(),
  // Deprecated in 1.1
  author: JsonFeedAuthorSchema.optional(),
  language: z.string().optional(),
});

export const JsonFeedSchema = z.object({
  version: z.string().refine(version => version.startsWith(JSON_FEED_VERSION_PREFIX), {
    message: 'Not a JSON Feed version URL',
  }),
  title: z.string().optional(),
  home_page_url: z.string().optional(),
  feed_url: z.string().optional(),
  description: z.string().optional(),
  language: z.string().optional(),
  authors: z.array(JsonFeedAuthorSchema).optional(),
  author: JsonFeedAuthorSchema.optional(),
  items: z.array(z.unknown()),
});

export type JsonFeed = z.infer<typeof JsonFeedSchema>;
export type JsonFeedItem = z.infer<typeof JsonFeedItemSchema>;
export type JsonFeedAuthor = z.infer<typeof JsonFeedAuthorSchema>;

/**
 * First named author of an item or feed, 1.1 `authors` before 1.0 `author`
 */
export function jsonFeedAuthor(source: { authors?: JsonFeedAuthor[]; author?: JsonFeedAuthor }): string | undefined {
  return source.authors?.find(author => author.name)?.name ?? source.author?.name;
}
