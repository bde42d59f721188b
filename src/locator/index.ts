export * from './basic-scanner';
export * from './structural';
