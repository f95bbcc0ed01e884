import pino from 'pino';
import { loadEnvSettings } from '../config.js';

// stdout carries the operator narration; diagnostics go to stderr.
export const logger = pino(
  {
    name: 'yt-sum-bootstrap',
    level: loadEnvSettings().logLevel,
  },
  pino.destination(2)
);
