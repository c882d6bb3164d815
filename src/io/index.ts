export * from './CsvReader';
