export * from './fake-responses';
