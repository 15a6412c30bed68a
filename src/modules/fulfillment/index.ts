export * from './constants';
export * from './fulfillment.config';
export * from './fulfillment.module';
export * from './controllers';
export * from './interceptors/raw-body.interceptor';
export * from './middleware/body-size.guard';
export * from './services/maintenance.service';
