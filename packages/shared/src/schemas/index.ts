export * from './gsi.schema';
