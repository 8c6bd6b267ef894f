export const LOG_PREFIX = "drone-step-comment:";

export type Logger = (message: string) => void;

export const consoleLogger: Logger = (message) => {
  console.log(`${LOG_PREFIX} ${message}`);
};
