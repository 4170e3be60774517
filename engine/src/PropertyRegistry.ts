import { Store } from './Store';
import { AccessControl } from './AccessControl';
import { LockRegistry, lockKeys } from './LockRegistry';
import { NotFoundError, ValidationError } from './errors';
import type { ListingInput, Property, PropertyRow, PropertyStatus } from './types';
import { parsePropertyRow } from './rows';
import { validateDuration } from './TimelockPolicy';
import { ESCROW_STATES } from './BidStateMachine';

const ESCROW_STATE_LIST = ESCROW_STATES.map(() => '?').join(', ');

export class PropertyRegistry {
  constructor(
    private readonly store: Store,
    private readonly access: AccessControl,
    private readonly locks: LockRegistry,
  ) {}

  get(id: number): Property | null {
    const row = this.store.db.prepare<unknown[], PropertyRow>(
      'SELECT * FROM properties WHERE id = ?'
    ).get(id);
    return row ? parsePropertyRow(row) : null;
  }

  require(id: number): Property {
    const property = this.get(id);
    if (!property) {
      throw new NotFoundError(`Property ${id} not found`);
    }
    return property;
  }

  byOwner(owner: string): Property[] {
    return this.store.db.prepare<unknown[], PropertyRow>(
      'SELECT * FROM properties WHERE owner = ? ORDER BY id ASC'
    ).all(owner).map(parsePropertyRow);
  }

  /** List a new property; the caller becomes its owner. */
  register(caller: string, listing: ListingInput): Property {
    validateListing(listing);
    const now = this.store.now();

    return this.store.atomic(() => {
      const result = this.store.db.prepare(`
        INSERT INTO properties (owner, status, price, lease_duration, damage_escrow, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        caller,
        listing.status,
        listing.price.toString(),
        listing.lease_duration ?? 0,
        (listing.damage_escrow ?? 0n).toString(),
        now,
        now
      );
      const property = this.require(Number(result.lastInsertRowid));

      this.store.emit('property.listed', {
        property_id: property.id,
        owner: caller,
        status: property.status,
        price: property.price.toString(),
      });
      this.store.logger.log(`Property ${property.id} listed by ${caller} (${property.status})`);
      return property;
    });
  }

  /** Put a sold or delisted property back on the market. */
  relist(caller: string, id: number, listing: ListingInput): Property {
    validateListing(listing);

    return this.store.atomic(() => {
      const property = this.require(id);
      this.access.requirePropertyOwner(caller, property);
      this.locks.assertFree([lockKeys.property(id)]);
      if (property.status === 'leased') {
        throw new ValidationError(`Property ${id} has an active lease`);
      }
      if (this.hasEscrowBid(id)) {
        throw new ValidationError(`Property ${id} has a transaction in escrow`);
      }
      // Bids left over from the previous listing must be refunded or claimed first
      if (this.hasOpenBid(id)) {
        throw new ValidationError(`Property ${id} still has open bids`);
      }

      this.store.db.prepare(`
        UPDATE properties
        SET status = ?, price = ?, lease_duration = ?, damage_escrow = ?, updated_at = ?
        WHERE id = ?
      `).run(
        listing.status,
        listing.price.toString(),
        listing.lease_duration ?? 0,
        (listing.damage_escrow ?? 0n).toString(),
        this.store.now(),
        id
      );

      this.store.emit('property.listed', {
        property_id: id,
        owner: caller,
        status: listing.status,
        price: listing.price.toString(),
      });
      return this.require(id);
    });
  }

  delist(caller: string, id: number): Property {
    return this.store.atomic(() => {
      const property = this.require(id);
      this.access.requirePropertyOwner(caller, property);
      this.locks.assertFree([lockKeys.property(id)]);
      if (property.status === 'leased') {
        throw new ValidationError(`Property ${id} has an active lease`);
      }
      if (this.hasEscrowBid(id)) {
        throw new ValidationError(`Property ${id} has a transaction in escrow`);
      }

      this.setStatus(id, 'delisted');
      this.store.emit('property.delisted', { property_id: id, owner: caller });
      return this.require(id);
    });
  }

  // ============== Internal transitions (called from settlement commits) ==============

  markSold(id: number, buyer: string): void {
    const now = this.store.now();
    this.store.db.prepare(`
      UPDATE properties
      SET owner = ?, status = 'sold', sold_to = ?, sold_at = ?, active_lease_id = NULL, updated_at = ?
      WHERE id = ?
    `).run(buyer, buyer, now, now, id);
  }

  markLeased(id: number, leaseId: number): void {
    this.store.db.prepare(`
      UPDATE properties SET status = 'leased', active_lease_id = ?, updated_at = ? WHERE id = ?
    `).run(leaseId, this.store.now(), id);
  }

  relistForLease(id: number): void {
    this.store.db.prepare(`
      UPDATE properties SET status = 'listed_for_lease', active_lease_id = NULL, updated_at = ? WHERE id = ?
    `).run(this.store.now(), id);
  }

  hasEscrowBid(id: number): boolean {
    return this.store.db.prepare(`
      SELECT 1 FROM bids
      WHERE property_id = ? AND state IN (${ESCROW_STATE_LIST})
      LIMIT 1
    `).get(id, ...ESCROW_STATES) !== undefined;
  }

  /** A pending bid that still holds funds. */
  hasOpenBid(id: number): boolean {
    return this.store.db.prepare(`
      SELECT 1 FROM bids
      WHERE property_id = ? AND state = 'pending' AND held_amount <> '0'
      LIMIT 1
    `).get(id) !== undefined;
  }

  private setStatus(id: number, status: PropertyStatus): void {
    this.store.db.prepare(
      'UPDATE properties SET status = ?, updated_at = ? WHERE id = ?'
    ).run(status, this.store.now(), id);
  }
}

function validateListing(listing: ListingInput): void {
  if (listing.status !== 'listed_for_sale' && listing.status !== 'listed_for_lease') {
    throw new ValidationError('status must be listed_for_sale or listed_for_lease');
  }
  if (listing.price < 0n) {
    throw new ValidationError('price must not be negative');
  }
  if (listing.status === 'listed_for_lease') {
    if (listing.lease_duration === undefined || listing.lease_duration <= 0) {
      throw new ValidationError('lease_duration is required for lease listings');
    }
    validateDuration('lease_duration', listing.lease_duration);
  }
  if (listing.damage_escrow !== undefined && listing.damage_escrow < 0n) {
    throw new ValidationError('damage_escrow must not be negative');
  }
}
