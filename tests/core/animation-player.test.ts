import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AnimationPlayer } from '../../src/core/animation-player';
import { InterpolationMethod } from '../../src/core/interpolation';
import { Marker } from '../../src/core/marker';
import { Timeline } from '../../src/core/timeline';
import { TimelineLayer } from '../../src/core/timeline-layer';
import { InvalidArgumentError, NotFoundError, TypeMismatchError } from '../../src/errors';
import { createLogger, LogLevel } from '../../src/utils/logger';
import { makeChannel, silentLogger } from '../helpers';

function createTimeline(): Timeline {
  return new Timeline(
    [
      new TimelineLayer('arm', [
        makeChannel('height', 'scalar', InterpolationMethod.Linear, [[0, 0], [2, 20]]),
        makeChannel('offset', 'vec3', InterpolationMethod.Linear, [[0, [0, 0, 0]], [2, [2, 0, 0]]]),
      ]),
    ],
    [new Marker('intro', 0.5), new Marker('outro', 1.5)]
  );
}

describe('AnimationPlayer', () => {
  let player: AnimationPlayer;

  beforeEach(() => {
    player = new AnimationPlayer(createTimeline(), { logger: silentLogger });
  });

  describe('initial state', () => {
    it('starts paused at the start of the timeline', () => {
      expect(player.isPlaying).toBe(false);
      expect(player.position).toBe(0);
      expect(player.playbackStart).toBe(0);
      expect(player.playbackEnd).toBe(2);
      expect(player.loop).toBe(false);
    });

    it('exposes markers and layers', () => {
      expect(player.markerNames).toEqual(['intro', 'outro']);
      expect(player.markers.map(marker => marker.position)).toEqual([0.5, 1.5]);
      expect(player.layerNames).toEqual(['arm']);
      expect(player.getLayers('arm')).toHaveLength(2);
    });

    it('rejects a negative sample threshold', () => {
      expect(() => new AnimationPlayer(createTimeline(), { sampleThreshold: -1 })).toThrow(InvalidArgumentError);
    });
  });

  describe('update', () => {
    it('does not move while paused', () => {
      player.update(1);
      expect(player.position).toBe(0);
    });

    it('advances while playing', () => {
      player.play();
      player.update(1.5);
      expect(player.position).toBe(1.5);
      expect(player.isPlaying).toBe(true);
    });

    it('stops at the end without looping', () => {
      player.play();
      player.update(1.5);
      player.update(1);
      expect(player.position).toBe(2);
      expect(player.isPlaying).toBe(false);
    });

    it('wraps around when looping', () => {
      player.loop = true;
      player.play();
      player.update(1.5);
      player.update(1);
      expect(player.position).toBe(0.5);
      expect(player.isPlaying).toBe(true);
    });

    it('wraps overshoots longer than the range', () => {
      player.loop = true;
      player.play();
      player.update(4.5);
      expect(player.position).toBe(0.5);
    });

    it('stays on the start of an empty looping range', () => {
      player.loop = true;
      player.playbackStart = 1;
      player.playbackEnd = 1;
      player.play();
      player.update(0.5);
      expect(player.position).toBe(1);
      expect(player.isPlaying).toBe(true);
    });

    it('stops when the range is reversed', () => {
      player.playbackStart = 2;
      player.playbackEnd = 1;
      player.play();
      player.update(0.1);
      expect(player.isPlaying).toBe(false);
      expect(player.position).toBe(2);
    });

    it('rejects negative and non-finite deltas', () => {
      player.play();
      expect(() => player.update(-0.1)).toThrow(InvalidArgumentError);
      expect(() => player.update(Number.NaN)).toThrow(InvalidArgumentError);
      expect(player.position).toBe(0);
    });
  });

  describe('play, pause and stop', () => {
    it('rewinds to the playback start on the first play', () => {
      player.playbackStart = 1;
      player.play();
      expect(player.position).toBe(1);
    });

    it('keeps an assigned position when playing', () => {
      player.playbackStart = 1;
      player.position = 1.2;
      player.play();
      expect(player.position).toBe(1.2);
    });

    it('rewinds on request', () => {
      player.play();
      player.update(1);
      player.play(true);
      expect(player.position).toBe(0);
    });

    it('pauses in place', () => {
      player.play();
      player.update(0.5);
      player.pause();
      player.update(1);
      expect(player.position).toBe(0.5);
      expect(player.isPlaying).toBe(false);
    });

    it('stops at the start of the timeline', () => {
      player.playbackStart = 1;
      player.play();
      player.update(0.5);
      player.stop();
      expect(player.position).toBe(0);
      expect(player.isPlaying).toBe(false);
    });

    it('rejects non-finite positions', () => {
      expect(() => {
        player.position = Number.POSITIVE_INFINITY;
      }).toThrow(InvalidArgumentError);
    });
  });

  describe('markers', () => {
    it('takes playback bounds from markers', () => {
      player.playbackStartMarker = 'intro';
      player.playbackEndMarker = 'outro';
      expect(player.playbackStart).toBe(0.5);
      expect(player.playbackEnd).toBe(1.5);
      expect(player.playbackStartMarker).toBe('intro');
      expect(player.playbackEndMarker).toBe('outro');
    });

    it('forgets the marker when a bound is set directly', () => {
      player.playbackStartMarker = 'intro';
      player.playbackStart = 0.7;
      expect(player.playbackStartMarker).toBeNull();
      expect(player.playbackStart).toBe(0.7);
    });

    it('ignores unknown markers with a warning', () => {
      const logger = createLogger({ level: LogLevel.WARN, timestamp: false });
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const warned = new AnimationPlayer(createTimeline(), { logger });

      warned.playbackEndMarker = 'missing';

      expect(warned.playbackEnd).toBe(2);
      expect(warned.playbackEndMarker).toBeNull();
      expect(log).toHaveBeenCalledTimes(1);
      log.mockRestore();
    });

    it('loops between markers', () => {
      player.playbackStartMarker = 'intro';
      player.playbackEndMarker = 'outro';
      player.loop = true;
      player.play();
      player.update(1.25);
      expect(player.position).toBe(0.75);
    });
  });

  describe('layers', () => {
    it('samples channels at the current position', () => {
      player.position = 1;
      expect(player.getLayer('arm', 'scalar').currentValue).toBe(10);
      expect(Array.from(player.getLayer('arm', 'vec3').currentValue)).toEqual([1, 0, 0]);
    });

    it('selects channels by name', () => {
      const layer = player.getLayer('arm', 'vec3', 'offset');
      expect(layer.channelName).toBe('offset');
      expect(layer.kind).toBe('vec3');
      expect(layer.toString()).toBe('arm/offset');
    });

    it('throws for unknown layers, channels and kinds', () => {
      expect(() => player.getLayer('leg', 'scalar')).toThrow(NotFoundError);
      expect(() => player.getLayer('arm', 'scalar', 'width')).toThrow(NotFoundError);
      expect(() => player.getLayer('arm', 'scalar', 'offset')).toThrow(TypeMismatchError);
      expect(() => player.getLayer('arm', 'quat')).toThrow(TypeMismatchError);
      expect(player.tryGetLayer('arm', 'quat')).toBeUndefined();
      expect(player.tryGetLayer('leg', 'scalar')).toBeUndefined();
    });

    it('reuses the last sample while the cursor stays within the threshold', () => {
      const layer = player.getLayer('arm', 'scalar');
      expect(layer.lastSampleTime).toBeUndefined();

      player.position = 1;
      expect(layer.currentValue).toBe(10);
      expect(layer.lastSampleTime).toBe(1);

      player.position = 1.005;
      expect(layer.currentValue).toBe(10);
      expect(layer.lastSampleTime).toBe(1);

      player.position = 1.02;
      expect(layer.currentValue).toBeCloseTo(10.2);
      expect(layer.lastSampleTime).toBe(1.02);
    });

    it('samples again after seeking backwards', () => {
      const layer = player.getLayer('arm', 'scalar');

      player.position = 1;
      expect(layer.currentValue).toBe(10);

      player.position = 0.5;
      expect(layer.currentValue).toBe(5);
      expect(layer.lastSampleTime).toBe(0.5);
    });

    it('samples again after the position wraps around', () => {
      const layer = player.getLayer('arm', 'scalar');
      player.loop = true;
      player.play();

      player.update(1.5);
      expect(layer.currentValue).toBe(15);

      player.update(1);
      expect(player.position).toBe(0.5);
      expect(layer.currentValue).toBe(5);
      expect(layer.lastSampleTime).toBe(0.5);
    });

    it('samples on the first read even at the start', () => {
      const layer = player.getLayer('arm', 'scalar');
      expect(layer.currentValue).toBe(0);
      expect(layer.lastSampleTime).toBe(0);
    });
  });
});
