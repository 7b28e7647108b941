export { Scheduler, type SchedulerOptions } from "./daemon";
