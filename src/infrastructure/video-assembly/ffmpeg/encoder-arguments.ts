import type { EncoderParameters } from '@domain/video-assembly/index.js';

import type { SerializedGraph } from './filter-graph.serializer.js';

export interface EncoderInvocation {
  readonly outputPath: string;
  readonly progressPath: string;
  readonly encoder: EncoderParameters;
}

export function buildEncoderArguments(graph: SerializedGraph, invocation: EncoderInvocation): string[] {
  const { encoder } = invocation;

  return [
    '-y',
    '-hide_banner',
    '-nostats',
    '-loglevel',
    'error',
    ...graph.inputs.flatMap((input) => ['-i', input]),
    '-filter_complex',
    graph.filterComplex,
    ...graph.maps.flatMap((map) => ['-map', map]),
    '-c:v',
    encoder.videoCodec,
    '-b:v',
    encoder.videoBitrate,
    '-b:a',
    encoder.audioBitrate,
    '-threads',
    String(encoder.threads),
    '-f',
    encoder.format,
    '-progress',
    invocation.progressPath,
    invocation.outputPath,
  ];
}
