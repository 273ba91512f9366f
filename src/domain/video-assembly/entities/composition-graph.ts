import { GraphBuildError } from '../errors/video-assembly.errors.js';

export type StreamKind = 'video' | 'audio';

export type NodeId = number;

export interface InputNode {
  readonly kind: 'input';
  readonly id: NodeId;
  readonly stream: StreamKind;
  readonly path: string;
}

export interface CropNode {
  readonly kind: 'crop';
  readonly id: NodeId;
  readonly stream: 'video';
  readonly source: NodeId;
  readonly width: string;
  readonly height: string;
  readonly x: string;
  readonly y: string;
}

export interface ScaleNode {
  readonly kind: 'scale';
  readonly id: NodeId;
  readonly stream: 'video';
  readonly source: NodeId;
  readonly width: number;
  /** `-1` keeps the aspect ratio of the source. */
  readonly height: number;
}

export interface ColorMixNode {
  readonly kind: 'colorMix';
  readonly id: NodeId;
  readonly stream: 'video';
  readonly source: NodeId;
  readonly alpha: number;
}

export interface OverlayNode {
  readonly kind: 'overlay';
  readonly id: NodeId;
  readonly stream: 'video';
  readonly base: NodeId;
  readonly overlay: NodeId;
  readonly x: string;
  readonly y: string;
  /** Visible while `enableFrom <= t < enableUntil`. */
  readonly enableFrom: number;
  readonly enableUntil: number;
}

export interface DrawTextNode {
  readonly kind: 'drawText';
  readonly id: NodeId;
  readonly stream: 'video';
  readonly source: NodeId;
  readonly text: string;
  readonly fontFile: string;
  readonly fontSize: number;
  readonly fontColor: string;
  readonly x: string;
  readonly y: string;
}

export interface ConcatAudioNode {
  readonly kind: 'concatAudio';
  readonly id: NodeId;
  readonly stream: 'audio';
  readonly sources: readonly NodeId[];
}

export interface MixAudioNode {
  readonly kind: 'mixAudio';
  readonly id: NodeId;
  readonly stream: 'audio';
  readonly primary: NodeId;
  readonly secondary: NodeId;
  readonly secondaryVolume: number;
  readonly duration: 'longest';
}

export interface OutputNode {
  readonly kind: 'output';
  readonly id: NodeId;
  readonly video: NodeId;
  readonly audio: NodeId;
}

export type StreamNode =
  | InputNode
  | CropNode
  | ScaleNode
  | ColorMixNode
  | OverlayNode
  | DrawTextNode
  | ConcatAudioNode
  | MixAudioNode;

export type GraphNode = StreamNode | OutputNode;

export type GraphNodeKind = GraphNode['kind'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * Read-only node arena. Nodes reference their inputs by id and every stream
 * node feeds at most one consumer.
 */
export class CompositionGraph {
  public readonly nodes: readonly GraphNode[];

  public readonly output: OutputNode;

  public constructor(nodes: readonly GraphNode[], output: OutputNode) {
    this.nodes = Object.freeze([...nodes]);
    this.output = output;
  }

  public node(id: NodeId): GraphNode {
    const found = this.nodes[id];
    if (!found) {
      throw new GraphBuildError(`Unknown graph node ${id}`, { id });
    }
    return found;
  }

  public nodesOfKind<K extends GraphNodeKind>(kind: K): Extract<GraphNode, { kind: K }>[] {
    return this.nodes.filter((node): node is Extract<GraphNode, { kind: K }> => node.kind === kind);
  }

  public count(kind: GraphNodeKind): number {
    return this.nodesOfKind(kind).length;
  }

  public inputs(): InputNode[] {
    return this.nodesOfKind('input');
  }
}

export class GraphArena {
  private readonly nodes: GraphNode[] = [];

  private readonly consumed = new Set<NodeId>();

  private sealed = false;

  public input(path: string, stream: StreamKind): NodeId {
    return this.append({ kind: 'input', stream, path });
  }

  public crop(source: NodeId, region: { width: string; height: string; x: string; y: string }): NodeId {
    this.consume(source, 'video');
    return this.append({ kind: 'crop', stream: 'video', source, ...region });
  }

  public scale(source: NodeId, width: number, height: number): NodeId {
    this.consume(source, 'video');
    return this.append({ kind: 'scale', stream: 'video', source, width, height });
  }

  public colorMix(source: NodeId, alpha: number): NodeId {
    this.consume(source, 'video');
    return this.append({ kind: 'colorMix', stream: 'video', source, alpha });
  }

  public overlay(
    base: NodeId,
    overlay: NodeId,
    placement: { x: string; y: string; enableFrom: number; enableUntil: number },
  ): NodeId {
    this.consume(base, 'video');
    this.consume(overlay, 'video');
    return this.append({ kind: 'overlay', stream: 'video', base, overlay, ...placement });
  }

  public drawText(
    source: NodeId,
    text: { text: string; fontFile: string; fontSize: number; fontColor: string; x: string; y: string },
  ): NodeId {
    this.consume(source, 'video');
    return this.append({ kind: 'drawText', stream: 'video', source, ...text });
  }

  public concatAudio(sources: readonly NodeId[]): NodeId {
    if (sources.length === 0) {
      throw new GraphBuildError('Audio concatenation needs at least one source');
    }
    sources.forEach((source) => this.consume(source, 'audio'));
    return this.append({ kind: 'concatAudio', stream: 'audio', sources: [...sources] });
  }

  public mixAudio(primary: NodeId, secondary: NodeId, secondaryVolume: number): NodeId {
    this.consume(primary, 'audio');
    this.consume(secondary, 'audio');
    return this.append({ kind: 'mixAudio', stream: 'audio', primary, secondary, secondaryVolume, duration: 'longest' });
  }

  public output(video: NodeId, audio: NodeId): CompositionGraph {
    this.consume(video, 'video');
    this.consume(audio, 'audio');
    const output: OutputNode = { kind: 'output', id: this.nodes.length, video, audio };
    this.nodes.push(output);
    this.sealed = true;
    return new CompositionGraph(this.nodes, output);
  }

  private append(spec: DistributiveOmit<StreamNode, 'id'>): NodeId {
    if (this.sealed) {
      throw new GraphBuildError('Cannot add nodes after the output node');
    }
    const id = this.nodes.length;
    this.nodes.push({ ...spec, id });
    return id;
  }

  private consume(id: NodeId, expected: StreamKind): void {
    const node = this.nodes[id];
    if (!node || node.kind === 'output') {
      throw new GraphBuildError(`Graph node ${id} does not exist`, { id });
    }
    if (node.stream !== expected) {
      throw new GraphBuildError(`Graph node ${id} carries ${node.stream}, expected ${expected}`, { id, expected });
    }
    if (this.consumed.has(id)) {
      throw new GraphBuildError(`Graph node ${id} is already consumed`, { id });
    }
    this.consumed.add(id);
  }
}
