export * from "./affiliate/linkStrategy";
export * from "./clients/messageSource";
export * from "./clients/deliveryClient";
export * from "./clients/captionWriter";
export * from "./ledger/ledgerStore";
