export * from './schemas/capability-profile';
export * from './schemas/opportunity';
export * from './schemas/match';
export * from './schemas/decision';
export * from './schemas/application';
export * from './schemas/submission';
export * from './schemas/run-report';
export * from './schemas/run-config';
