export * from "./provision-errors";
