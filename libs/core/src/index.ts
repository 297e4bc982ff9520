export * from './core.module';
export * from './env.schema';
export * from './log-level';
