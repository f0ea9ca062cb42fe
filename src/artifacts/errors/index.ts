export * from './storage.error';
export * from './file-not-found.error';
export * from './access-denied.error';
