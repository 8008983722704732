import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { DateTime } from 'luxon';
import { Listing } from '@libs/models';
import { reportingConfig } from '../../config';

export interface DigestItem {
  listing: Listing;
  highlighted: boolean;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string | number): string {
  return String(value).replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function orDash(value: number): string {
  return value === 0 ? '-' : String(value);
}

@Injectable()
export class DigestRenderer {
  public constructor(
    @Inject(reportingConfig.KEY)
    private readonly config: ConfigType<typeof reportingConfig>,
  ) {}

  public subject(part: number, total: number, now: number): string {
    return `New listings ${part}/${total} @ ${this.formatDate(now)}`;
  }

  public render(items: readonly DigestItem[]): string {
    const blocks = items.map((item) => this.renderItem(item));
    return ['<html>', '<body>', ...blocks, '</body>', '</html>'].join('\n');
  }

  public renderItem({ listing, highlighted }: DigestItem): string {
    const title = escapeHtml(listing.address || listing.url);
    const pricePerM2 = listing.areaM2 > 0 ? Math.round(listing.price / listing.areaM2) : 0;

    const lines = [
      highlighted ? '<div class="listing highlighted">' : '<div class="listing">',
      `<h3><a href="${escapeHtml(listing.url)}">${title}</a>${highlighted ? ' <strong>[watched address]</strong>' : ''}</h3>`,
    ];
    if (listing.imageUrl) {
      lines.push(`<img src="${escapeHtml(listing.imageUrl)}" width="320">`);
    }
    lines.push(
      '<ul>',
      `<li>Price: ${escapeHtml(orDash(listing.price))} EUR</li>`,
      `<li>Area: ${escapeHtml(orDash(listing.areaM2))} m2</li>`,
      `<li>Price per m2: ${escapeHtml(orDash(pricePerM2))} EUR</li>`,
      `<li>Rooms: ${escapeHtml(orDash(listing.nRooms))}</li>`,
      `<li>Built: ${escapeHtml(orDash(listing.constructionYear))}</li>`,
      `<li>Listed: ${listing.dateListed > 0 ? this.formatDate(listing.dateListed) : '-'}</li>`,
      `<li>Portal: ${escapeHtml(listing.portal)}</li>`,
      '</ul>',
      '</div>',
    );
    return lines.join('\n');
  }

  private formatDate(epochSeconds: number): string {
    return DateTime.fromSeconds(epochSeconds, { zone: this.config.timeZone }).toFormat('dd-MM-yyyy');
  }
}
