export * from "./detector";
export * from "./recovery";
export * from "./stateMachine";
