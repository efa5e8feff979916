export {
  PoolClosedError,
  type PoolHandle,
  type PoolResult,
  type PoolUnit,
  type ShutdownOptions,
  WorkerPool,
  type WorkerPoolOptions,
} from "./worker-pool.js"
