export * from './config';
export * from './policy';
export * from './red-flags';
export * from './providers';
export * from './retry';
export * from './context';
export * from './session-store';
export * from './generator';
export * from './cases';
export * from './authoring';
export * from './judge';
export * from './review';
export * from './report';
export * from './harness';
export * from './run-store';
export * from './pipeline';
export * from './tools/retrieval';
export * from './tools/patientContext';
