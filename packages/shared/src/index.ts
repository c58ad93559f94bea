export * from "./api";
export * from "./errors";
export * from "./gstin";
export * from "./schemas/money";
export * from "./schemas/pagination";
export * from "./schemas/invoices";
export * from "./schemas/payments-received";
