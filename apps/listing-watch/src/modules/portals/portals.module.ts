import { Module } from '@nestjs/common';
import { City24Adapter } from './adapters/city24.adapter';
import { KvAdapter } from './adapters/kv.adapter';
import { PortalRegistry } from './portal-registry.service';

@Module({
  providers: [City24Adapter, KvAdapter, PortalRegistry],
  exports: [PortalRegistry],
})
export class PortalsModule {}
