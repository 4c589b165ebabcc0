import pino from 'pino';

const logger = pino({
  name: 'notetree',
  level: process.env.LOG_LEVEL || 'info',
});

export default logger;
