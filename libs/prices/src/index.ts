export * from './price.models';
export * from './price.repository';
export * from './price-update.service';
export * from './prices.module';
