export {BatchDeposit} from "./batchDeposit.js";
export type {BatchDepositModules, BatchDepositInitOpts} from "./batchDeposit.js";
export * from "./errors.js";
export * from "./events.js";
export * from "./options.js";
export * from "./metrics.js";
export * from "./acceptor/index.js";
export {AccessGate} from "./accessGate.js";
export {RecordStore} from "./recordStore.js";
export {BatchEditor} from "./batchEditor.js";
export type {BatchEditorModules, BatchEditorOpts} from "./batchEditor.js";
export {DepositTrigger} from "./depositTrigger.js";
export type {DepositReceipt, DepositTriggerModules, DepositTriggerOpts} from "./depositTrigger.js";
export * from "./depositDataFile.js";
export {JobQueue, QueueError, QueueErrorCode} from "./util/queue.js";
export type {JobQueueOpts} from "./util/queue.js";
