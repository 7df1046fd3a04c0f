import { describe, it, expect } from 'vitest';
import { Document, Node } from '@gltf-transform/core';
import { createNodeNameMap, importGltf } from '../../src/converters/gltf';
import { InterpolationMethod } from '../../src/core/interpolation';
import { CapacityExceededError, ImportError } from '../../src/errors';
import { expectCloseTo, IDENTITY, silentLogger, translation } from '../helpers';

interface Rig {
  document: Document;
  hip: Node;
  knee: Node;
}

function createRig(): Rig {
  const document = new Document();
  const hip = document.createNode('hip').setTranslation([0, 1, 0]);
  const knee = document.createNode('knee').setTranslation([0, -1, 0]);
  hip.addChild(knee);
  document.createScene('scene').addChild(hip);

  const times = document.createAccessor().setType('SCALAR').setArray(new Float32Array([0, 1, 2]));
  const offsets = document.createAccessor().setType('VEC3').setArray(new Float32Array([0, 0, 0, 1, 0, 0, 2, 0, 0]));
  const sampler = document.createAnimationSampler().setInput(times).setOutput(offsets).setInterpolation('LINEAR');
  const channel = document.createAnimationChannel().setTargetNode(hip).setTargetPath('translation').setSampler(sampler);
  document.createAnimation('walk').addSampler(sampler).addChannel(channel);

  const inverseBindMatrices = document.createAccessor()
    .setType('MAT4')
    .setArray(new Float32Array([...IDENTITY, ...translation(0, -7, 0)]));
  document.createSkin('rig').addJoint(hip).addJoint(knee).setInverseBindMatrices(inverseBindMatrices);

  return { document, hip, knee };
}

describe('glTF import', () => {
  describe('animations', () => {
    it('creates one layer per animated node', () => {
      const { timelines } = importGltf(createRig().document, { bakeRestPose: false }, silentLogger);
      const walk = timelines.get('walk');

      expect(Array.from(timelines.keys())).toEqual(['walk']);
      expect(walk?.layerNames).toEqual(['hip']);
      expect(walk?.getLayer('hip').channelNames).toEqual(['position']);
    });

    it('reads keyframes and interpolation', () => {
      const { timelines } = importGltf(createRig().document, { bakeRestPose: false }, silentLogger);
      const position = timelines.get('walk')?.getLayer('hip').getChannel('position', 'vec3');

      expect(position?.interpolationMethod).toBe(InterpolationMethod.Linear);
      expect(position?.keyframeCount).toBe(3);
      expectCloseTo(position?.sample(0.5) ?? [], [0.5, 0, 0]);
    });

    it('marks the animation range', () => {
      const walk = importGltf(createRig().document, { bakeRestPose: false }, silentLogger).timelines.get('walk');

      expect(walk?.markerNames).toEqual(['start', 'end']);
      expect(walk?.start).toBe(0);
      expect(walk?.end).toBe(2);
    });

    it('fills undriven joint components with the rest pose', () => {
      const walk = importGltf(createRig().document, {}, silentLogger).timelines.get('walk');

      expect(walk?.layerNames).toEqual(['hip', 'knee']);
      expect(walk?.getLayer('hip').channelNames).toEqual(['position', 'rotation', 'scale']);

      const knee = walk?.getLayer('knee');
      expect(knee?.channelNames).toEqual(['position', 'rotation', 'scale']);
      expect(knee?.getChannel('position', 'vec3').interpolationMethod).toBe(InterpolationMethod.None);
      expectCloseTo(knee?.getChannel('position', 'vec3').sample(5) ?? [], [0, -1, 0]);
      expectCloseTo(knee?.getChannel('scale', 'vec3').sample(5) ?? [], [1, 1, 1]);
      expectCloseTo(knee?.getChannel('rotation', 'quat').sample(5) ?? [], [0, 0, 0, 1]);
    });

    it('places rest pose keyframes at the first sample', () => {
      const document = new Document();
      const hip = document.createNode('hip');
      const knee = document.createNode('knee').setTranslation([0, -1, 0]);
      hip.addChild(knee);
      const times = document.createAccessor().setType('SCALAR').setArray(new Float32Array([1, 2, 3]));
      const offsets = document.createAccessor().setType('VEC3').setArray(new Float32Array([0, 0, 0, 1, 0, 0, 2, 0, 0]));
      const sampler = document.createAnimationSampler().setInput(times).setOutput(offsets).setInterpolation('LINEAR');
      const channel = document.createAnimationChannel().setTargetNode(hip).setTargetPath('translation').setSampler(sampler);
      document.createAnimation('late').addSampler(sampler).addChannel(channel);
      document.createSkin('rig').addJoint(hip).addJoint(knee);

      const late = importGltf(document, {}, silentLogger).timelines.get('late');

      expect(late?.start).toBe(1);
      expect(late?.end).toBe(3);
      expect(late?.getLayer('knee').getChannel('position', 'vec3').getKeyframe(0).position).toBe(1);
      expect(late?.getLayer('hip').getChannel('scale', 'vec3').getKeyframe(0).position).toBe(1);
    });

    it('keeps only the values of cubic spline samplers', () => {
      const document = new Document();
      const node = document.createNode('tip');
      const times = document.createAccessor().setType('SCALAR').setArray(new Float32Array([0, 1]));
      const outputs = document.createAccessor().setType('VEC3').setArray(new Float32Array([
        9, 9, 9, 1, 1, 1, 8, 8, 8,
        7, 7, 7, 3, 3, 3, 6, 6, 6,
      ]));
      const sampler = document.createAnimationSampler().setInput(times).setOutput(outputs).setInterpolation('CUBICSPLINE');
      const channel = document.createAnimationChannel().setTargetNode(node).setTargetPath('scale').setSampler(sampler);
      document.createAnimation().addSampler(sampler).addChannel(channel);

      const timeline = importGltf(document, { bakeRestPose: false }, silentLogger).timelines.get('animation_0');
      const scale = timeline?.getLayer('tip').getChannel('scale', 'vec3');

      expect(scale?.interpolationMethod).toBe(InterpolationMethod.Cubic);
      expectCloseTo(scale?.getKeyframe(0).value ?? [], [1, 1, 1]);
      expectCloseTo(scale?.getKeyframe(1).value ?? [], [3, 3, 3]);
    });

    it('skips samplers whose output does not match the input', () => {
      const document = new Document();
      const node = document.createNode('tip');
      const times = document.createAccessor().setType('SCALAR').setArray(new Float32Array([0, 1, 2]));
      const outputs = document.createAccessor().setType('VEC3').setArray(new Float32Array([0, 0, 0]));
      const sampler = document.createAnimationSampler().setInput(times).setOutput(outputs).setInterpolation('STEP');
      const channel = document.createAnimationChannel().setTargetNode(node).setTargetPath('translation').setSampler(sampler);
      document.createAnimation('broken').addSampler(sampler).addChannel(channel);

      const timeline = importGltf(document, { bakeRestPose: false }, silentLogger).timelines.get('broken');

      expect(timeline?.layerNames).toEqual([]);
      expect(timeline?.markerNames).toEqual([]);
    });
  });

  describe('skeletons', () => {
    it('creates one skeleton per skin', () => {
      const { skeletons } = importGltf(createRig().document, {}, silentLogger);
      const rig = skeletons.get('rig');

      expect(Array.from(skeletons.keys())).toEqual(['rig']);
      expect(rig?.bones.map(bone => bone.identifier)).toEqual(['_root', 'hip', 'knee']);
      expect(rig?.bones.map(bone => bone.index)).toEqual([null, 0, 1]);
      expect(rig?.highestBoneIndex).toBe(1);
    });

    it('keeps the joint hierarchy and inverse bind matrices', () => {
      const rig = importGltf(createRig().document, {}, silentLogger).skeletons.get('rig');
      const knee = rig?.findBone('knee');

      expect(knee).toBe(2);
      if (rig !== undefined && knee !== undefined) {
        expect(rig.getParent(knee)).toBe(1);
        expect(rig.getValue(knee).offset[13]).toBe(-7);
        expectCloseTo(rig.getValue(1).offset, IDENTITY);
      }
    });

    it('names unnamed skins by position', () => {
      const document = new Document();
      document.createSkin().addJoint(document.createNode('bone'));

      const { skeletons } = importGltf(document, {}, silentLogger);

      expect(Array.from(skeletons.keys())).toEqual(['skin_0']);
      expectCloseTo(skeletons.get('skin_0')?.getValue(1).offset ?? [], IDENTITY);
    });

    it('rejects inverse bind matrices that are not 4x4', () => {
      const document = new Document();
      const inverseBindMatrices = document.createAccessor().setType('VEC4').setArray(new Float32Array(4));
      document.createSkin('flat').addJoint(document.createNode('bone')).setInverseBindMatrices(inverseBindMatrices);

      expect(() => importGltf(document, {}, silentLogger)).toThrow(ImportError);
    });

    it('rejects skins with more than 128 joints', () => {
      const document = new Document();
      const skin = document.createSkin('crowd');
      for (let i = 0; i < 129; i++) {
        skin.addJoint(document.createNode(`joint${i}`));
      }

      expect(() => importGltf(document, {}, silentLogger)).toThrow(CapacityExceededError);
    });
  });

  describe('node names', () => {
    it('makes duplicate and missing names unique', () => {
      const document = new Document();
      const first = document.createNode('bone');
      const second = document.createNode('bone');
      const unnamed = document.createNode();

      const names = createNodeNameMap(document);

      expect(names.get(first)).toBe('bone');
      expect(names.get(second)).toBe('bone_1');
      expect(names.get(unnamed)).toBe('node_2');
    });

    it('names blank nodes by position', () => {
      const document = new Document();
      const blank = document.createNode(' ');
      document.createSkin('rig').addJoint(blank);

      expect(createNodeNameMap(document).get(blank)).toBe('node_0');
      expect(importGltf(document, {}, silentLogger).skeletons.get('rig')?.findBone('node_0')).toBe(1);
    });
  });
});
