export * from './ConsoleLogger';
export * from './Logger';
