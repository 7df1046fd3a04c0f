/**
 * Timeline
 *
 * Named layers of keyframe channels plus named markers. Immutable once built.
 */

import { DuplicateKeyError, NotFoundError } from '../errors';
import type { Duration } from './keyframe';
import { Marker } from './marker';
import { TimelineLayer } from './timeline-layer';

export class Timeline {
  readonly start: Duration;
  readonly end: Duration;
  readonly length: Duration;

  private readonly layerMap: ReadonlyMap<string, TimelineLayer>;
  private readonly markerMap: ReadonlyMap<string, Marker>;
  private readonly sortedMarkers: readonly Marker[];

  constructor(layers: Iterable<TimelineLayer> = [], markers: Iterable<Marker> = []) {
    const layerMap = new Map<string, TimelineLayer>();
    for (const layer of layers) {
      if (layerMap.has(layer.name)) {
        throw new DuplicateKeyError(`Timeline has more than one layer named "${layer.name}"`, layer.name);
      }
      layerMap.set(layer.name, layer);
    }

    const markerMap = new Map<string, Marker>();
    for (const marker of markers) {
      if (markerMap.has(marker.name)) {
        throw new DuplicateKeyError(`Timeline has more than one marker named "${marker.name}"`, marker.name);
      }
      markerMap.set(marker.name, marker);
    }

    let start = Number.POSITIVE_INFINITY;
    let end = Number.NEGATIVE_INFINITY;
    for (const layer of layerMap.values()) {
      if (!layer.hasKeyframes) continue;
      start = Math.min(start, layer.start);
      end = Math.max(end, layer.end);
    }
    for (const marker of markerMap.values()) {
      start = Math.min(start, marker.position);
      end = Math.max(end, marker.position);
    }

    this.layerMap = layerMap;
    this.markerMap = markerMap;
    this.sortedMarkers = Array.from(markerMap.values()).sort((a, b) => a.position - b.position);
    this.start = Number.isFinite(start) ? start : 0;
    this.end = Number.isFinite(end) ? end : 0;
    this.length = this.end - this.start;
  }

  get layers(): readonly TimelineLayer[] {
    return Array.from(this.layerMap.values());
  }

  get layerNames(): string[] {
    return Array.from(this.layerMap.keys());
  }

  /**
   * Markers ordered by position
   */
  get markers(): readonly Marker[] {
    return this.sortedMarkers;
  }

  get markerNames(): string[] {
    return this.sortedMarkers.map(marker => marker.name);
  }

  hasLayer(name: string): boolean {
    return this.layerMap.has(name);
  }

  getLayer(name: string): TimelineLayer {
    const layer = this.layerMap.get(name);
    if (layer === undefined) {
      throw new NotFoundError('layer', name);
    }
    return layer;
  }

  tryGetLayer(name: string): TimelineLayer | undefined {
    return this.layerMap.get(name);
  }

  hasMarker(name: string): boolean {
    return this.markerMap.has(name);
  }

  getMarker(name: string): Marker {
    const marker = this.markerMap.get(name);
    if (marker === undefined) {
      throw new NotFoundError('marker', name);
    }
    return marker;
  }

  tryGetMarker(name: string): Marker | undefined {
    return this.markerMap.get(name);
  }
}
