import {Counter, Gauge, Histogram, Registry} from "prom-client";

export enum TriggerOutcome {
  success = "success",
  rejected = "rejected",
  acceptorError = "acceptor_error",
}

export type BatchDepositMetrics = {
  recordsQueued: Gauge<string>;
  recordsAdded: Counter<string>;
  recordsDeleted: Counter<string>;
  triggers: Counter<"outcome">;
  validatorsDeposited: Counter<string>;
  acceptorBatchTime: Histogram<string>;
};

export function createBatchDepositMetrics(register: Registry): BatchDepositMetrics {
  const registers = [register];
  return {
    recordsQueued: new Gauge({
      name: "batch_deposit_records_queued",
      help: "Deposit records queued across all beneficiaries",
      registers,
    }),
    recordsAdded: new Counter({
      name: "batch_deposit_records_added_total",
      help: "Total deposit records added by the owner",
      registers,
    }),
    recordsDeleted: new Counter({
      name: "batch_deposit_records_deleted_total",
      help: "Total deposit records deleted by the owner",
      registers,
    }),
    triggers: new Counter({
      name: "batch_deposit_triggers_total",
      help: "Total value transfers received, by outcome",
      labelNames: ["outcome"],
      registers,
    }),
    validatorsDeposited: new Counter({
      name: "batch_deposit_validators_deposited_total",
      help: "Total records forwarded and committed to the acceptor",
      registers,
    }),
    acceptorBatchTime: new Histogram({
      name: "batch_deposit_acceptor_batch_seconds",
      help: "Time to submit and commit one trigger's records to the acceptor",
      buckets: [0.001, 0.01, 0.1, 1, 5],
      registers,
    }),
  };
}
