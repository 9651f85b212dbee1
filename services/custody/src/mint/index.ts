export * from "./payment.js";
export * from "./mint-controller.js";
