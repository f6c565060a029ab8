export * from './remote-ssh';
export * from './command';
export * from './runner';
