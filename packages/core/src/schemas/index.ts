export * from './discovery-schemas';
