/**
 * Animation Player
 *
 * A playback cursor over a timeline. The player owns one layer per channel
 * of every timeline layer; each of them reads its value at the cursor.
 *
 * @example
 * ```typescript
 * const player = new AnimationPlayer(timeline, { loop: true });
 * player.play();
 * player.update(1 / 60);
 * const rotation = player.getLayer('arm', 'quat').currentValue;
 * ```
 */

import { ANIMATION } from '../constants/animation';
import { ERROR_MESSAGES } from '../constants/errors';
import { InvalidArgumentError, NotFoundError, TypeMismatchError } from '../errors';
import { logger as defaultLogger, Logger } from '../utils/logger';
import { assertFinite, wrap } from '../utils/math-utils';
import { AnimationPlayerLayer, isPlayerLayerOfKind, PlaybackCursor } from './animation-player-layer';
import type { ValueKind } from './interpolation';
import type { Duration } from './keyframe';
import type { Marker } from './marker';
import type { Timeline } from './timeline';

/**
 * Anything that advances with simulation time.
 */
export interface Animated {
  readonly isPlaying: boolean;
  update(delta: Duration): void;
}

/**
 * Animation Player Options
 */
export interface AnimationPlayerOptions {
  loop?: boolean;
  /** Cursor movement, in seconds, below which layers keep their cached value. */
  sampleThreshold?: Duration;
  logger?: Logger;
}

export class AnimationPlayer implements PlaybackCursor, Animated {
  readonly timeline: Timeline;
  readonly sampleThreshold: Duration;

  isPlaying = false;
  loop: boolean;

  private currentPosition: Duration;
  private rewindPending = true;
  private start: Duration;
  private end: Duration;
  private startMarker: string | null = null;
  private endMarker: string | null = null;
  private readonly playerLayers: ReadonlyMap<string, readonly AnimationPlayerLayer[]>;
  private readonly logger: Logger;

  constructor(timeline: Timeline, options: AnimationPlayerOptions = {}) {
    const sampleThreshold = options.sampleThreshold ?? ANIMATION.SAMPLE_THRESHOLD;
    if (!(sampleThreshold >= 0)) {
      throw new InvalidArgumentError('Sample threshold must not be negative', 'sampleThreshold', { sampleThreshold });
    }

    this.timeline = timeline;
    this.sampleThreshold = sampleThreshold;
    this.loop = options.loop ?? false;
    this.logger = options.logger ?? defaultLogger;
    this.start = timeline.start;
    this.end = timeline.end;
    this.currentPosition = timeline.start;

    const playerLayers = new Map<string, AnimationPlayerLayer[]>();
    for (const layer of timeline.layers) {
      const channels: AnimationPlayerLayer[] = [];
      for (const channel of layer) {
        channels.push(new AnimationPlayerLayer(this, layer.name, channel, sampleThreshold));
      }
      playerLayers.set(layer.name, channels);
    }
    this.playerLayers = playerLayers;
  }

  /**
   * Current playback position in seconds.
   * Assigning a position cancels the rewind the first `play()` would do.
   */
  get position(): Duration {
    return this.currentPosition;
  }

  set position(value: Duration) {
    assertFinite(value, 'position');
    this.currentPosition = value;
    this.rewindPending = false;
  }

  get playbackStart(): Duration {
    return this.start;
  }

  set playbackStart(value: Duration) {
    assertFinite(value, 'playbackStart');
    this.start = value;
    this.startMarker = null;
  }

  get playbackEnd(): Duration {
    return this.end;
  }

  set playbackEnd(value: Duration) {
    assertFinite(value, 'playbackEnd');
    this.end = value;
    this.endMarker = null;
  }

  /**
   * Name of the marker the playback start was taken from, if any.
   * Assigning a known marker moves the start to its position; unknown names
   * are ignored.
   */
  get playbackStartMarker(): string | null {
    return this.startMarker;
  }

  set playbackStartMarker(name: string | null) {
    if (name === null) {
      this.startMarker = null;
      return;
    }
    const marker = this.resolveMarker(name, 'playbackStartMarker');
    if (marker !== undefined) {
      this.start = marker.position;
      this.startMarker = marker.name;
    }
  }

  get playbackEndMarker(): string | null {
    return this.endMarker;
  }

  set playbackEndMarker(name: string | null) {
    if (name === null) {
      this.endMarker = null;
      return;
    }
    const marker = this.resolveMarker(name, 'playbackEndMarker');
    if (marker !== undefined) {
      this.end = marker.position;
      this.endMarker = marker.name;
    }
  }

  get markers(): readonly Marker[] {
    return this.timeline.markers;
  }

  get markerNames(): string[] {
    return this.timeline.markerNames;
  }

  get layerNames(): string[] {
    return Array.from(this.playerLayers.keys());
  }

  /**
   * Starts playback, from the playback start if `rewind` is set or the
   * position was never assigned.
   */
  play(rewind = false): void {
    if (rewind || this.rewindPending) {
      this.position = this.start;
    }
    this.isPlaying = true;
    this.logger.debug('Playback started', { operation: 'play', position: this.currentPosition });
  }

  pause(): void {
    this.isPlaying = false;
    this.logger.debug('Playback paused', { operation: 'pause', position: this.currentPosition });
  }

  /**
   * Stops playback and moves the cursor to the start of the timeline.
   */
  stop(): void {
    this.position = this.timeline.start;
    this.isPlaying = false;
    this.logger.debug('Playback stopped', { operation: 'stop' });
  }

  /**
   * Advances the cursor by `delta` seconds while playing.
   */
  update(delta: Duration): void {
    if (!Number.isFinite(delta) || delta < 0) {
      throw new InvalidArgumentError(ERROR_MESSAGES.NEGATIVE_DELTA, 'delta', { delta });
    }

    if (this.end < this.start) {
      if (this.isPlaying) {
        this.logger.warn('Playback range is empty, stopping playback', {
          operation: 'update',
          playbackStart: this.start,
          playbackEnd: this.end,
        });
      }
      this.isPlaying = false;
    }

    if (!this.isPlaying) return;

    const next = this.currentPosition + delta;
    if (next > this.end) {
      if (this.loop) {
        this.position = this.start + wrap(next - this.end, this.end - this.start);
      } else {
        this.position = this.end;
        this.isPlaying = false;
        this.logger.debug('Playback reached the end', { operation: 'update', position: this.end });
      }
    } else {
      this.position = next;
    }
  }

  /**
   * Player layer of a timeline layer's channel.
   *
   * With a channel name the channel must exist and store `kind` values.
   * Without one, the first channel storing `kind` values is returned.
   *
   * @throws NotFoundError when the layer or named channel does not exist
   * @throws TypeMismatchError when the channel stores another kind
   */
  getLayer<K extends ValueKind>(layerName: string, kind: K, channelName?: string): AnimationPlayerLayer<K> {
    const layers = this.playerLayers.get(layerName);
    if (layers === undefined) {
      throw new NotFoundError('layer', layerName);
    }

    if (channelName !== undefined) {
      const layer = layers.find(candidate => candidate.channelName === channelName);
      if (layer === undefined) {
        throw new NotFoundError('channel', `${layerName}/${channelName}`);
      }
      if (!isPlayerLayerOfKind(layer, kind)) {
        throw new TypeMismatchError(
          `Channel "${channelName}" of layer "${layerName}" stores ${layer.kind} values, not ${kind}`,
          kind,
          layer.kind
        );
      }
      return layer;
    }

    if (layers.length === 0) {
      throw new NotFoundError('channel', layerName, { reason: 'layer has no channels' });
    }
    const layer = layers.find((candidate): candidate is AnimationPlayerLayer<K> => isPlayerLayerOfKind(candidate, kind));
    if (layer === undefined) {
      throw new TypeMismatchError(
        `Layer "${layerName}" has no channel storing ${kind} values`,
        kind,
        layers.map(candidate => candidate.kind).join(', ')
      );
    }
    return layer;
  }

  /**
   * Same as {@link getLayer}, returning undefined instead of throwing for
   * missing or mistyped layers.
   */
  tryGetLayer<K extends ValueKind>(layerName: string, kind: K, channelName?: string): AnimationPlayerLayer<K> | undefined {
    try {
      return this.getLayer(layerName, kind, channelName);
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof TypeMismatchError) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * All player layers of one timeline layer
   */
  getLayers(layerName: string): readonly AnimationPlayerLayer[] {
    const layers = this.playerLayers.get(layerName);
    if (layers === undefined) {
      throw new NotFoundError('layer', layerName);
    }
    return layers;
  }

  private resolveMarker(name: string, bound: string): Marker | undefined {
    const marker = this.timeline.tryGetMarker(name);
    if (marker === undefined) {
      this.logger.warn(`Marker "${name}" does not exist, ${bound} is unchanged`, { operation: bound, marker: name });
    }
    return marker;
  }
}
