import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { DatabaseService } from "../database/database.service";
import { CacheUnavailableError, describeError } from "./sos.errors";
import { cachedContactsSchema } from "./sos.schemas";
import { ContactOrigin, ContactSet, normalizeCountryKey } from "./sos.types";

const DAY_MS = 24 * 60 * 60 * 1000;

export type CacheLookup =
  | { status: "hit"; contactSet: ContactSet; ageMs: number; stale: boolean }
  | { status: "miss" }
  | { status: "unavailable"; error: CacheUnavailableError };

interface CacheRow {
  country: string;
  contacts_json: string;
  fetched_at: string;
  written_at: string;
  origin: ContactOrigin;
}

@Injectable()
export class ContactCacheService {
  private readonly logger = new Logger(ContactCacheService.name);
  readonly ttlMs: number;

  constructor(
    private readonly database: DatabaseService,
    private readonly configService: ConfigService
  ) {
    this.ttlMs = (this.configService.get<number>("SOS_CACHE_TTL_DAYS") ?? 30) * DAY_MS;
  }

  /**
   * Pure lookup, no external calls. Age is measured from the set's fetchedAt.
   * A broken store or an unreadable row is "unavailable", never a miss.
   */
  get(country: string): CacheLookup {
    const key = normalizeCountryKey(country);
    try {
      const row = this.database.db
        .prepare<[string], CacheRow>(
          "SELECT country, contacts_json, fetched_at, written_at, origin FROM sos_contact_cache WHERE country_key = ?"
        )
        .get(key);
      if (!row) return { status: "miss" };

      const fetchedAtMs = Date.parse(row.fetched_at);
      if (Number.isNaN(fetchedAtMs)) {
        throw new Error(`invalid fetched_at "${row.fetched_at}"`);
      }
      const contacts = cachedContactsSchema.parse(JSON.parse(row.contacts_json));
      const ageMs = Math.max(0, Date.now() - fetchedAtMs);

      return {
        status: "hit",
        contactSet: {
          country: row.country,
          contacts,
          fetchedAt: new Date(fetchedAtMs).toISOString(),
          origin: "cached",
        },
        ageMs,
        stale: this.isStale(ageMs),
      };
    } catch (error) {
      const unavailable = new CacheUnavailableError(`Cache read failed for "${key}": ${describeError(error)}`, { cause: error });
      this.logger.warn(unavailable.message);
      return { status: "unavailable", error: unavailable };
    }
  }

  /**
   * Insert or overwrite the entry for a country
   */
  put(country: string, contactSet: ContactSet): void {
    const key = normalizeCountryKey(country);
    try {
      this.database.db
        .prepare(
          `INSERT INTO sos_contact_cache (country_key, country, contacts_json, fetched_at, written_at, origin)
           VALUES (@key, @country, @contactsJson, @fetchedAt, @writtenAt, @origin)
           ON CONFLICT(country_key) DO UPDATE SET
             country = excluded.country,
             contacts_json = excluded.contacts_json,
             fetched_at = excluded.fetched_at,
             written_at = excluded.written_at,
             origin = excluded.origin`
        )
        .run({
          key,
          country: contactSet.country,
          contactsJson: JSON.stringify(contactSet.contacts),
          fetchedAt: contactSet.fetchedAt,
          writtenAt: new Date().toISOString(),
          origin: contactSet.origin,
        });
    } catch (error) {
      throw new CacheUnavailableError(`Cache write failed for "${key}": ${describeError(error)}`, { cause: error });
    }
  }

  isStale(ageMs: number): boolean {
    return ageMs >= this.ttlMs;
  }
}
