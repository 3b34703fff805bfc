export * from './remote-ssh';
export * from './pipeline';
