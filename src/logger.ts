//shared pino logger, one child per component
import { pino, type Logger } from 'pino';

export const logger: Logger = pino({
  name: 'asset-document-router',
  level: process.env.LOG_LEVEL || 'info',
});

const children: Logger[] = [];

export function createLogger(component: string): Logger {
  const child = logger.child({ component });
  children.push(child);
  return child;
}

//children copy the level at creation, so a configured level is pushed to each of them
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) child.level = level;
}
