import { type CompositionGraph, GraphArena, type NodeId } from '../entities/composition-graph.js';
import type { RenderJob } from '../entities/render-job.js';
import { GraphBuildError } from '../errors/video-assembly.errors.js';
import type { Timeline } from '../value-objects/overlay-window.js';
import { screenshotWidth } from '../value-objects/render-settings.js';

export type RenderVariant = 'main' | 'narrationOnly';

const CENTERED_X = '(main_w-overlay_w)/2';
const CENTERED_Y = '(main_h-overlay_h)/2';

export function buildCompositionGraph(
  job: RenderJob,
  timeline: Timeline,
  variant: RenderVariant = 'main',
): CompositionGraph {
  const { width, height } = job.settings.resolution;

  if (timeline.windows.length !== job.segments.length) {
    throw new GraphBuildError('Timeline and segments are out of step', {
      windows: timeline.windows.length,
      segments: job.segments.length,
    });
  }

  const segmentsInWindowOrder = timeline.windows.map((window) => {
    const segment = job.segments[window.segmentIndex];
    if (!segment) {
      throw new GraphBuildError(`Window refers to unknown segment ${window.segmentIndex}`, {
        segmentIndex: window.segmentIndex,
      });
    }
    if (segment.imagePath === null) {
      throw new GraphBuildError(`Segment ${segment.index} has no image to overlay`, { segmentIndex: segment.index });
    }
    return { window, segment, imagePath: segment.imagePath };
  });

  const arena = new GraphArena();

  const background = arena.input(job.backgroundVideoPath, 'video');
  let video: NodeId = arena.crop(background, {
    width: `ih*(${width}/${height})`,
    height: 'ih',
    x: '(iw-ow)/2',
    y: '0',
  });

  const overlayWidth = screenshotWidth(job.settings);
  for (const { window, imagePath } of segmentsInWindowOrder) {
    let image = arena.scale(arena.input(imagePath, 'video'), overlayWidth, -1);
    if (window.opacity < 1) {
      image = arena.colorMix(image, window.opacity);
    }
    video = arena.overlay(video, image, {
      x: CENTERED_X,
      y: CENTERED_Y,
      enableFrom: window.startSeconds,
      enableUntil: window.endSeconds,
    });
  }

  const narration = arena.concatAudio(
    segmentsInWindowOrder.map(({ segment }) => arena.input(segment.audioPath, 'audio')),
  );

  let audio = narration;
  if (variant === 'main' && job.mixesBackgroundAudio && job.backgroundAudioPath !== null) {
    const backgroundAudio = arena.input(job.backgroundAudioPath, 'audio');
    audio = arena.mixAudio(narration, backgroundAudio, job.settings.backgroundAudioVolume);
  }

  if (job.credit) {
    video = arena.drawText(video, {
      text: job.credit.text,
      fontFile: job.credit.fontFile,
      fontSize: job.credit.fontSize,
      fontColor: job.credit.fontColor,
      x: '(w-text_w)',
      y: '(h-text_h)',
    });
  }

  video = arena.scale(video, width, height);

  return arena.output(video, audio);
}
