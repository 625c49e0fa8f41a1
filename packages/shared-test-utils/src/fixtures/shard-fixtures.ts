/**
 * Synthetic shard files for tests
 *
 * Every value is a small integer derived from its position, so tests can
 * tell exactly which shard and event an element came from.
 */

import { join } from 'node:path';
import { writeNpz, type DatasetKind, type NdArray } from '@jetshards/core';

export interface ShardDims {
  eventsPerShard: number;
  nConstituents: number;
  nFeatures: number;
}

/**
 * Value stored at (event, constituent, feature) of shard `shard`
 */
export function constituentValue(
  shard: number,
  event: number,
  constituent: number,
  feature: number,
  dims: ShardDims,
): number {
  return (
    shard * 10000 +
    event * 100 +
    constituent * dims.nFeatures +
    feature
  );
}

/**
 * Truth label stored for `event` of shard `shard`
 */
export function labelValue(shard: number, event: number): number {
  return (shard + event) % 2;
}

/**
 * Build the two arrays of one synthetic shard
 */
export function createShardArrays(
  shard: number,
  dims: ShardDims,
): { constituents: NdArray<Float32Array>; truth_label: NdArray<Float32Array> } {
  const { eventsPerShard, nConstituents, nFeatures } = dims;
  const vectors = new Float32Array(eventsPerShard * nConstituents * nFeatures);
  const labels = new Float32Array(eventsPerShard);

  let offset = 0;
  for (let e = 0; e < eventsPerShard; e++) {
    labels[e] = labelValue(shard, e);
    for (let c = 0; c < nConstituents; c++) {
      for (let f = 0; f < nFeatures; f++) {
        vectors[offset++] = constituentValue(shard, e, c, f, dims);
      }
    }
  }

  return {
    constituents: { shape: [eventsPerShard, nConstituents, nFeatures], data: vectors },
    truth_label: { shape: [eventsPerShard], data: labels },
  };
}

/**
 * Write `<dir>/<kind>_<index>.npz` holding a synthetic shard
 *
 * @returns Path of the written file
 */
export async function writeShard(
  dir: string,
  kind: DatasetKind,
  index: number,
  dims: ShardDims,
): Promise<string> {
  const path = join(dir, `${kind}_${index}.npz`);
  await writeNpz(path, createShardArrays(index, dims));
  return path;
}
