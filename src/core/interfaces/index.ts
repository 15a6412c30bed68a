// Interface and type exports
export * from './common.types';
export * from './storage.adapter';
export * from './payment-provider.adapter';
export * from './collaborators.interface';
export * from './event-dispatcher.interface';
export * from './configuration.interface';
