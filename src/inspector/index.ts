export * from './Inspector';
