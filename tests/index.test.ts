import { describe, it, expect, vi } from 'vitest';
import { ConfigError, defineConfig, LogLevel, RigMotion } from '../src';

const timelineDocument = {
  layers: [{
    name: 'hip',
    channels: [{
      name: 'position',
      kind: 'vec3',
      interpolation: 'linear',
      keyframes: [{ position: 0, value: [0, 0, 0] }, { position: 2, value: [2, 0, 0] }],
    }],
  }],
};

const skeletonDocument = {
  root: {
    bone: { identifier: '_root', index: null, offset: [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1] },
    children: [{
      bone: { identifier: 'hip', index: 0, offset: [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1] },
      children: [],
    }],
  },
};

describe('RigMotion', () => {
  it('applies defaults', () => {
    expect(defineConfig().getConfig()).toEqual({
      debug: false,
      logLevel: 'info',
      sampleThreshold: 0.01,
      loop: false,
      overlayInfluence: 0,
      bakeRestPose: true,
    });
  });

  it('rejects invalid configuration', () => {
    expect(() => defineConfig({ sampleThreshold: -1 })).toThrow(ConfigError);
    expect(() => defineConfig({ overlayInfluence: 2 })).toThrow(ConfigError);
  });

  it('maps the log level and lets debug override it', () => {
    expect(defineConfig({ logLevel: 'silent' }).logger.level).toBe(LogLevel.SILENT);

    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    expect(new RigMotion({ debug: true, logLevel: 'error' }).logger.level).toBe(LogLevel.DEBUG);
    log.mockRestore();
  });

  it('creates players from its configuration', () => {
    const rig = defineConfig({ logLevel: 'silent', loop: true, sampleThreshold: 0.5, overlayInfluence: 0.25 });
    const timeline = rig.loadTimeline(timelineDocument);

    const player = rig.createPlayer(timeline);
    expect(player.loop).toBe(true);
    expect(player.sampleThreshold).toBe(0.5);

    const deformerPlayer = rig.createDeformerPlayer(timeline, rig.loadSkeleton(skeletonDocument));
    expect(deformerPlayer.overlayInfluence).toBe(0.25);
    expect(deformerPlayer.animationPlayer.loop).toBe(true);
  });

  it('drives a skeleton end to end', () => {
    const rig = defineConfig({ logLevel: 'silent' });
    const player = rig.createDeformerPlayer(rig.loadTimeline(timelineDocument), rig.loadSkeleton(skeletonDocument));

    player.animationPlayer.play();
    player.update(1);

    expect(Array.from(player.getCurrentDeformer().toFloat32Array())).toEqual([
      1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 1, 0, 0, 1,
    ]);
  });

  it('writes documents back', () => {
    const rig = defineConfig({ logLevel: 'silent' });
    expect(rig.saveTimeline(rig.loadTimeline(timelineDocument))).toEqual({ markers: [], ...timelineDocument });
    expect(rig.saveSkeleton(rig.loadSkeleton(skeletonDocument))).toEqual(skeletonDocument);
  });
});
