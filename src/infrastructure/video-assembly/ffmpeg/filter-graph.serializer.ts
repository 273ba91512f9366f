import type { CompositionGraph, NodeId, StreamKind } from '@domain/video-assembly/index.js';

import { formatDecimal } from '@/shared/media/numberUtils.js';

import { quoteFilterValue } from './filter-escaping.js';

export interface SerializedGraph {
  /** File paths in `-i` order. */
  readonly inputs: readonly string[];
  readonly filterComplex: string;
  /** `-map` values for the video and audio streams, in that order. */
  readonly maps: readonly [string, string];
}

interface InputStream {
  readonly index: number;
  readonly stream: StreamKind;
}

export function serializeCompositionGraph(graph: CompositionGraph): SerializedGraph {
  const inputStreams = new Map<NodeId, InputStream>();
  const inputs: string[] = [];

  for (const node of graph.inputs()) {
    inputStreams.set(node.id, { index: inputs.length, stream: node.stream });
    inputs.push(node.path);
  }

  const streamName = (id: NodeId): string => {
    const input = inputStreams.get(id);
    return input ? `${input.index}:${input.stream === 'video' ? 'v' : 'a'}` : `n${id}`;
  };
  const pad = (id: NodeId): string => `[${streamName(id)}]`;
  const mapTarget = (id: NodeId): string => (inputStreams.has(id) ? streamName(id) : pad(id));

  const chains: string[] = [];

  for (const node of graph.nodes) {
    const out = `[n${node.id}]`;

    switch (node.kind) {
      case 'input':
      case 'output':
        break;
      case 'crop':
        chains.push(`${pad(node.source)}crop=${node.width}:${node.height}:${node.x}:${node.y}${out}`);
        break;
      case 'scale':
        chains.push(`${pad(node.source)}scale=${node.width}:${node.height}${out}`);
        break;
      case 'colorMix':
        chains.push(`${pad(node.source)}colorchannelmixer=aa=${formatDecimal(node.alpha)}${out}`);
        break;
      case 'overlay': {
        const enable = `gte(t,${formatDecimal(node.enableFrom)})*lt(t,${formatDecimal(node.enableUntil)})`;
        chains.push(`${pad(node.base)}${pad(node.overlay)}overlay=x=${node.x}:y=${node.y}:enable='${enable}'${out}`);
        break;
      }
      case 'drawText':
        chains.push(
          `${pad(node.source)}drawtext=text=${quoteFilterValue(node.text)}`
            + `:fontfile=${quoteFilterValue(node.fontFile)}`
            + `:fontsize=${node.fontSize}:fontcolor=${node.fontColor}`
            + `:x=${node.x}:y=${node.y}:expansion=none${out}`,
        );
        break;
      case 'concatAudio':
        chains.push(`${node.sources.map(pad).join('')}concat=n=${node.sources.length}:v=0:a=1${out}`);
        break;
      case 'mixAudio': {
        const scaled = `[n${node.id}bg]`;
        chains.push(`${pad(node.secondary)}volume=${formatDecimal(node.secondaryVolume)}${scaled}`);
        chains.push(`${pad(node.primary)}${scaled}amix=inputs=2:duration=${node.duration}${out}`);
        break;
      }
      default: {
        const exhaustive: never = node;
        throw new Error(`Unsupported graph node ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  return {
    inputs,
    filterComplex: chains.join(';'),
    maps: [mapTarget(graph.output.video), mapTarget(graph.output.audio)],
  };
}
