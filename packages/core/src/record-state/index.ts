export {
  RecordStateRegistry,
  createRecordStateRegistry,
  type RecordStateRegistryConfig,
  type SnapshotSource,
} from './record-state-registry.js';
