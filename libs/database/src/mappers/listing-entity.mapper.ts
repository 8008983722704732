import { Listing } from '@libs/models';
import { ListingEntity } from '../entities/listing.entity';

export function toListing(entity: ListingEntity): Listing {
  return Listing.create({
    id: entity.id,
    portal: entity.portal,
    active: entity.active === 1,
    reported: entity.reported === 1,
    url: entity.url,
    imageUrl: entity.imageUrl,
    address: entity.address,
    city: entity.city,
    street: entity.street,
    houseNumber: entity.houseNumber,
    apartmentNumber: entity.apartmentNumber,
    nRooms: entity.nRooms,
    areaM2: entity.areaM2,
    price: entity.price,
    constructionYear: entity.constructionYear,
    dateListed: entity.dateListed,
    dateScraped: entity.dateScraped,
    dateUnlisted: entity.dateUnlisted,
  });
}

export function toListingEntity(listing: Listing): ListingEntity {
  const entity = new ListingEntity();
  entity.id = listing.id;
  entity.portal = listing.portal;
  entity.active = listing.active ? 1 : 0;
  entity.reported = listing.reported ? 1 : 0;
  entity.url = listing.url;
  entity.imageUrl = listing.imageUrl;
  entity.address = listing.address;
  entity.city = listing.city;
  entity.street = listing.street;
  entity.houseNumber = listing.houseNumber;
  entity.apartmentNumber = listing.apartmentNumber;
  entity.nRooms = listing.nRooms;
  entity.areaM2 = listing.areaM2;
  entity.price = listing.price;
  entity.constructionYear = listing.constructionYear;
  entity.dateListed = listing.dateListed;
  entity.dateScraped = listing.dateScraped;
  entity.dateUnlisted = listing.dateUnlisted;
  return entity;
}
