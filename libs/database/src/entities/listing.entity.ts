import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import { LISTINGS_TABLE } from '@libs/common';

/**
 * Stored listing observation. Flags are kept as 0/1 integers so the same
 * schema works on SQLite and PostgreSQL.
 */
@Entity(LISTINGS_TABLE)
@Index('IDX_listings_portal_active', ['portal', 'active'])
export class ListingEntity {
  @PrimaryColumn({ type: 'text' })
  public id!: string;

  @Column({ type: 'text', default: '' })
  public portal!: string;

  // === Lifecycle ===
  @Column({ type: 'integer', default: 0 })
  public active!: number;

  @Column({ type: 'integer', default: 0 })
  public reported!: number;

  // === Links ===
  @Column({ type: 'text', default: '' })
  public url!: string;

  @Column({ name: 'image_url', type: 'text', default: '' })
  public imageUrl!: string;

  // === Address ===
  @Column({ type: 'text', default: '' })
  public address!: string;

  @Column({ type: 'text', default: '' })
  public city!: string;

  @Column({ type: 'text', default: '' })
  public street!: string;

  @Column({ name: 'house_number', type: 'text', default: '' })
  public houseNumber!: string;

  @Column({ name: 'apartment_number', type: 'text', default: '' })
  public apartmentNumber!: string;

  // === Characteristics ===
  @Column({ name: 'n_rooms', type: 'integer', default: 0 })
  public nRooms!: number;

  @Column({ name: 'area_m2', type: 'double precision', default: 0 })
  public areaM2!: number;

  @Column({ type: 'double precision', default: 0 })
  public price!: number;

  @Column({ name: 'construction_year', type: 'integer', default: 0 })
  public constructionYear!: number;

  // === Dates (epoch seconds) ===
  @Column({ name: 'date_listed', type: 'double precision', default: 0 })
  public dateListed!: number;

  @Column({ name: 'date_scraped', type: 'double precision', default: 0 })
  public dateScraped!: number;

  @Column({ name: 'date_unlisted', type: 'double precision', default: 0 })
  public dateUnlisted!: number;
}
