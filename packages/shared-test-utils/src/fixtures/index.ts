export {
  createShardArrays,
  writeShard,
  constituentValue,
  labelValue,
  type ShardDims,
} from './shard-fixtures.js';
