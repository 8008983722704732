export * from './portal-adapter.interface';
export * from './adapters/base-portal.adapter';
export * from './adapters/city24.adapter';
export * from './adapters/kv.adapter';
export * from './portal-registry.service';
export * from './portals.module';
