export * from "./TransferExecutor";
export * from "./TransferExecutorFs";
