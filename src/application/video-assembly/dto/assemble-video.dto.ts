import { z } from 'zod';

import { videoSettingsSchema } from '@/shared/config/settings.js';

const directoryName = z.string().min(1).regex(/^[\w-]+$/, 'must be usable as a directory name');

export const assembleVideoCommandSchema = z.object({
  id: directoryName,
  title: z.string().min(1),
  category: directoryName.default('general'),
  itemCount: z.number().int().min(0),
  credit: z.string().min(1).optional(),
  composeTitleCard: z.boolean().default(false),
  settings: videoSettingsSchema,
});

export type AssembleVideoPayload = z.input<typeof assembleVideoCommandSchema>;

export type ValidatedAssembleVideoPayload = z.output<typeof assembleVideoCommandSchema>;
