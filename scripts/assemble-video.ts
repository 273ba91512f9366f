import { cpus } from 'node:os';
import path from 'node:path';

import {
  AssembleVideoCommand,
  AssembleVideoHandler,
  type RenderProgressUpdate,
  removeScratchDirectory,
} from '@/application/video-assembly/index.js';
import {
  CachedDurationProbe,
  CanvasImageTextComposer,
  FfmpegRenderer,
  FfprobeDurationProbe,
  fileProgressMonitorFactory,
  PngPlaceholderWriter,
} from '@/infrastructure/video-assembly/index.js';
import { loadVideoSettings } from '@/shared/config/settings.js';
import { toPercent } from '@/shared/media/numberUtils.js';

interface CliOptions {
  id: string;
  title: string;
  count: number;
  config: string;
  category: string;
  credit?: string;
  titleCard: boolean;
}

const VARIANT_LABELS: Record<RenderProgressUpdate['variant'], string> = {
  main: 'Video',
  narrationOnly: 'Narration-only video',
};

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const settings = await loadVideoSettings(path.resolve(options.config));

  const handler = new AssembleVideoHandler({
    probe: new CachedDurationProbe(new FfprobeDurationProbe()),
    placeholderWriter: new PngPlaceholderWriter(),
    renderer: new FfmpegRenderer({
      encoder: {
        videoCodec: settings.encoder.videoCodec,
        videoBitrate: settings.encoder.videoBitrate,
        audioBitrate: settings.encoder.audioBitrate,
        threads: settings.encoder.threads ?? cpus().length,
        format: 'mp4',
      },
    }),
    createProgressMonitor: fileProgressMonitorFactory(),
    composer: new CanvasImageTextComposer(),
    cleanupScratch: removeScratchDirectory,
  });

  const command = new AssembleVideoCommand(
    {
      id: options.id,
      title: options.title,
      category: options.category,
      itemCount: options.count,
      credit: options.credit,
      composeTitleCard: options.titleCard,
      settings,
    },
    printProgress,
  );

  const result = await handler.execute(command);

  console.log(`Video (${result.durationSeconds.toFixed(1)}s): ${result.mainPath}`);
  if (result.narrationOnlyPath) {
    console.log(`Narration-only video: ${result.narrationOnlyPath}`);
  }
  if (result.thumbnailPath) {
    console.log(`Thumbnail: ${result.thumbnailPath}`);
  }
}

function printProgress(update: RenderProgressUpdate): void {
  const percent = Math.min(100, toPercent(update.fraction));
  process.stdout.write(`\r${VARIANT_LABELS[update.variant]}: ${percent.toFixed(2)}%`);
  if (update.fraction >= 1) {
    process.stdout.write('\n');
  }
}

function parseArgs(argv: string[]): CliOptions {
  const options: Partial<CliOptions> = {
    config: 'config/settings.json',
    category: 'general',
    titleCard: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined || !arg.startsWith('--')) continue;

    const next = argv[i + 1];
    switch (arg) {
      case '--id':
        options.id = next;
        i += 1;
        break;
      case '--title':
        options.title = next;
        i += 1;
        break;
      case '--count':
        options.count = next === undefined ? undefined : Number.parseInt(next, 10);
        i += 1;
        break;
      case '--config':
        options.config = next;
        i += 1;
        break;
      case '--category':
        options.category = next;
        i += 1;
        break;
      case '--credit':
        options.credit = next;
        i += 1;
        break;
      case '--title-card':
        options.titleCard = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  const { id, title, count, config, category, credit, titleCard } = options;
  if (!id || !title || count === undefined || Number.isNaN(count) || !config || !category) {
    throw new Error(
      'Usage: npm run assemble -- --id <contentId> --title <title> --count <items> '
        + '[--config config/settings.json] [--category <label>] [--credit <author>] [--title-card]',
    );
  }

  return { id, title, count, config, category, credit, titleCard: titleCard ?? false };
}

main().catch((error) => {
  console.error('\n[assemble-video] fatal:', error);
  process.exitCode = 1;
});
