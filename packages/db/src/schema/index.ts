export * from './tag-corrections';
