export type { BarStorePort } from './barStorePort.js';
export type {
  TrainingSample,
  FoldContext,
  TrainableUnit,
  TrainableUnitFactory,
} from './trainableUnitPort.js';
