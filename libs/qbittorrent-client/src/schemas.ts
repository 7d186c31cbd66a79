import { z } from 'zod';
import { parseMagnetLink } from './magnet';
import type { MagnetLink } from './types';

// Responses from /api/v2. Field names are mapped to camelCase; unknown fields
// are dropped.

export const torrentSchema = z
  .object({
    hash: z.string(),
    name: z.string(),
    category: z.string().default(''),
    tags: z.string().default(''),
    state: z.string(),
    size: z.number().default(0),
    progress: z.number().default(0),
    downloaded: z.number().default(0),
    uploaded: z.number().default(0),
    dlspeed: z.number().default(0),
    upspeed: z.number().default(0),
    eta: z.number().default(0),
    ratio: z.number().default(0),
    priority: z.number().default(0),
    num_seeds: z.number().default(0),
    num_leechs: z.number().default(0),
    added_on: z.number().default(0),
    completion_on: z.number().default(0),
    save_path: z.string().default(''),
    magnet_uri: z.string().default(''),
    force_start: z.boolean().default(false),
    seq_dl: z.boolean().default(false),
    super_seeding: z.boolean().default(false),
  })
  .transform((raw, ctx) => {
    let magnetLink: MagnetLink | undefined;
    if (raw.magnet_uri) {
      try {
        magnetLink = parseMagnetLink(raw.magnet_uri);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['magnet_uri'],
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    }
    return {
      hash: raw.hash,
      name: raw.name,
      category: raw.category,
      tags: raw.tags ? raw.tags.split(',').map((tag) => tag.trim()).filter(Boolean) : [],
      state: raw.state,
      size: raw.size,
      progress: raw.progress,
      downloaded: raw.downloaded,
      uploaded: raw.uploaded,
      downloadSpeed: raw.dlspeed,
      uploadSpeed: raw.upspeed,
      eta: raw.eta,
      ratio: raw.ratio,
      priority: raw.priority,
      seeds: raw.num_seeds,
      leechers: raw.num_leechs,
      addedOn: raw.added_on,
      completionOn: raw.completion_on,
      savePath: raw.save_path,
      magnetUri: raw.magnet_uri,
      magnetLink,
      forceStart: raw.force_start,
      sequentialDownload: raw.seq_dl,
      superSeeding: raw.super_seeding,
    };
  });

export const torrentListSchema = z.array(torrentSchema);

export const transferInfoSchema = z
  .object({
    dl_info_speed: z.number(),
    dl_info_data: z.number(),
    up_info_speed: z.number(),
    up_info_data: z.number(),
    dl_rate_limit: z.number().default(0),
    up_rate_limit: z.number().default(0),
    dht_nodes: z.number().default(0),
    connection_status: z.string(),
  })
  .transform((raw) => ({
    downloadSpeed: raw.dl_info_speed,
    downloaded: raw.dl_info_data,
    uploadSpeed: raw.up_info_speed,
    uploaded: raw.up_info_data,
    downloadRateLimit: raw.dl_rate_limit,
    uploadRateLimit: raw.up_rate_limit,
    dhtNodes: raw.dht_nodes,
    connectionStatus: raw.connection_status,
  }));

export const categorySchema = z.object({
  name: z.string(),
  savePath: z.string().default(''),
});

export const categoriesSchema = z.record(categorySchema);

export type Torrent = z.output<typeof torrentSchema>;
export type TransferInfo = z.output<typeof transferInfoSchema>;
export type Category = z.output<typeof categorySchema>;
