"use strict";

import pino from "pino";

export type { Logger } from "pino";

export const logger = pino({
  name: "packet-layers",
  level: process.env["LOG_LEVEL"] || "info"
});
