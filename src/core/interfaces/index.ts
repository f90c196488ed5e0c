// Interface and type exports
export * from './payload-store';
