export {
  createRecord,
  describeRecordProblem,
  isBackStackRecord,
  type BackStackRecord,
} from './record.js';
export {
  createSequentialKeyGenerator,
  generateRecordKey,
  type KeyGenerator,
} from './record-key.js';
