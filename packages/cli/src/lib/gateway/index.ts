export {
  type BatchTarget,
  type ExecuteOptions,
  executeBatch,
  type GatewaySession,
  orderRecords,
  resolveTarget,
  runBatch,
} from "./gateway";
