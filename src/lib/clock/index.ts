export { systemClock, type Clock } from "./clock";
export { createManualClock, type ManualClock } from "./manual-clock";
