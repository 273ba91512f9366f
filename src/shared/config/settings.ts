import { readFile } from 'node:fs/promises';

import { z } from 'zod';

const hexOrNamedColor = z
  .string()
  .regex(/^(#(?:[0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})|[a-z]+)$/i, 'must be a hex colour or a colour name');

export const videoSettingsSchema = z.object({
  resolution: z
    .object({
      width: z.number().int().positive().default(1080),
      height: z.number().int().positive().default(1920),
    })
    .default({}),
  opacity: z.number().min(0).max(1).default(0.9),
  storyMode: z.boolean().default(false),
  storyModeMethod: z.union([z.literal(0), z.literal(1)]).default(1),
  storyModeBlankImages: z.boolean().default(false),
  channelName: z.string().default(''),
  background: z
    .object({
      audioVolume: z.number().min(0).max(1).default(0.15),
      enableNarrationOnlyVariant: z.boolean().default(false),
      thumbnail: z
        .object({
          enabled: z.boolean().default(false),
          fontFamily: z.string().min(1).default('arial'),
          fontSize: z.number().int().positive().default(96),
          fontColor: hexOrNamedColor.default('#ffffff'),
        })
        .default({}),
    })
    .default({}),
  encoder: z
    .object({
      videoCodec: z.string().min(1).default('h264'),
      videoBitrate: z.string().min(1).default('20M'),
      audioBitrate: z.string().min(1).default('192k'),
      threads: z.number().int().positive().optional(),
    })
    .default({}),
  paths: z
    .object({
      scratchRoot: z.string().min(1).default('assets/temp'),
      resultsRoot: z.string().min(1).default('results'),
      fontsDir: z.string().min(1).default('fonts'),
      titleTemplate: z.string().min(1).default('assets/title_template.png'),
      backgroundsDir: z.string().min(1).default('assets/backgrounds'),
    })
    .default({}),
});

export type VideoSettings = z.infer<typeof videoSettingsSchema>;

export function parseVideoSettings(raw: unknown): VideoSettings {
  const parsed = videoSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const invalid = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid video settings: ${invalid}`);
  }
  return parsed.data;
}

export async function loadVideoSettings(filePath: string): Promise<VideoSettings> {
  const contents = await readFile(filePath, 'utf8');
  const raw: unknown = JSON.parse(contents);
  return parseVideoSettings(raw);
}
