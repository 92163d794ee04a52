export { CheckpointStore, fromCheckpointUnit, toCheckpointUnit } from './checkpoint.js';
