import pino from "pino";

const underTest = process.env.NODE_ENV === "test" || !!process.env.VITEST;

export const logger = pino({
  name: "tool-launcher",
  level: process.env.LOG_LEVEL || (underTest ? "silent" : "info"),
});

export type { Logger } from "pino";
