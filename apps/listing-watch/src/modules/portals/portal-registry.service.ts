import { Injectable } from '@nestjs/common';
import { basename, extname } from 'path';
import { Portal } from '@libs/common';
import { City24Adapter } from './adapters/city24.adapter';
import { KvAdapter } from './adapters/kv.adapter';
import { PortalAdapter } from './portal-adapter.interface';

@Injectable()
export class PortalRegistry {
  private readonly adapters: ReadonlyArray<PortalAdapter<unknown>>;

  public constructor(city24Adapter: City24Adapter, kvAdapter: KvAdapter) {
    this.adapters = [city24Adapter, kvAdapter];
  }

  public get portals(): Portal[] {
    return this.adapters.map((adapter) => adapter.portal);
  }

  public forPortal(portal: Portal): PortalAdapter<unknown> | undefined {
    return this.adapters.find((adapter) => adapter.portal === portal);
  }

  /**
   * Adapter for a captured page, picked by the indicator that ends the
   * file's base name: `1700000000_kv.html` -> kv
   */
  public forFile(fileName: string): PortalAdapter<unknown> | undefined {
    const stem = basename(fileName, extname(fileName));
    return this.adapters.find((adapter) => stem.endsWith(`_${adapter.fileIndicator}`));
  }
}
