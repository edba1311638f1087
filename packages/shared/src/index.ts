export * from './envConfig';
export * from './postgres';
