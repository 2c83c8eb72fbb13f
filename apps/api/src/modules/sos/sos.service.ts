import { Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { SingleFlight } from "../../common/utils/single-flight";
import { withTimeout } from "../../common/utils/with-timeout";
import { ContactSearchService } from "../search/contact-search.service";
import { CacheLookup, ContactCacheService } from "./contact-cache.service";
import { ContactExtractorService } from "./contact-extractor.service";
import { ContactValidatorService } from "./contact-validator.service";
import {
  DefaultExhaustedError,
  describeError,
  PipelineDeadlineError,
  SosPipelineError,
  ValidationFailedError,
} from "./sos.errors";
import { buildDefaultContactSet } from "./static-default";
import { ContactSet, normalizeCountryKey } from "./sos.types";

const DEADLINE_MARGIN_MS = 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface GetContactsOptions {
  forceRefresh?: boolean;
}

type RefreshOutcome = { ok: true; contactSet: ContactSet } | { ok: false; error: unknown };

/**
 * Serves emergency contacts for a country: fresh cache first, then a single
 * search → extract → validate run, then the last cached value, then the static default.
 * Callers always get a well-formed 5-contact set; origin tells them which path produced it.
 */
@Injectable()
export class SosService implements OnModuleInit {
  private readonly logger = new Logger(SosService.name);
  private readonly refreshes = new SingleFlight<RefreshOutcome>();
  private readonly defaultCountry: string;
  readonly deadlineMs: number;

  constructor(
    private readonly cache: ContactCacheService,
    private readonly search: ContactSearchService,
    private readonly extractor: ContactExtractorService,
    private readonly validator: ContactValidatorService,
    private readonly configService: ConfigService
  ) {
    this.defaultCountry = this.configService.get<string>("SOS_DEFAULT_COUNTRY") ?? "India";
    this.deadlineMs = this.search.timeoutMs + this.extractor.timeoutMs + DEADLINE_MARGIN_MS;
  }

  onModuleInit(): void {
    this.assertDefaultIsValid();
  }

  assertDefaultIsValid(): void {
    const result = this.validator.validate(buildDefaultContactSet(this.defaultCountry));
    if (!result.valid) {
      throw new DefaultExhaustedError(`Static default contact set is malformed: ${result.error.reason} (${result.error.detail})`);
    }
  }

  async getEmergencyContacts(country: string, options: GetContactsOptions = {}): Promise<ContactSet> {
    const displayCountry = country.trim().replace(/\s+/g, " ") || this.defaultCountry;
    const key = normalizeCountryKey(displayCountry);

    const lookup = this.cache.get(displayCountry);
    if (lookup.status === "hit" && !lookup.stale && !options.forceRefresh) {
      this.logger.log(`Returning cached contacts for ${displayCountry} (${Math.floor(lookup.ageMs / DAY_MS)} days old)`);
      return lookup.contactSet;
    }
    this.logger.log(`Fetching fresh contacts for ${displayCountry} (${this.describeLookup(lookup, options)})`);

    let outcome: RefreshOutcome;
    try {
      outcome = await withTimeout(
        this.refreshes.run(key, () => this.refresh(displayCountry)),
        this.deadlineMs,
        () => new PipelineDeadlineError(`Refresh for "${displayCountry}" exceeded ${this.deadlineMs}ms`)
      );
    } catch (error) {
      // Only the deadline rejects; the run carries on and may still fill the cache
      outcome = { ok: false, error };
    }

    if (outcome.ok) return outcome.contactSet;

    const kind = outcome.error instanceof SosPipelineError ? outcome.error.kind : "unexpected";
    this.logger.warn(`Fresh fetch failed for ${displayCountry} [${kind}]: ${describeError(outcome.error)}`);
    return this.fallback(displayCountry, lookup);
  }

  private async refresh(country: string): Promise<RefreshOutcome> {
    const currentYear = new Date().getFullYear();
    try {
      const raw = await this.search.search(country, currentYear);
      const candidate = await this.extractor.extract(raw, country, currentYear);

      const validation = this.validator.validate(candidate);
      if (!validation.valid) {
        throw new ValidationFailedError(validation.error);
      }

      this.store(country, validation.contactSet);
      return { ok: true, contactSet: validation.contactSet };
    } catch (error) {
      if (!(error instanceof SosPipelineError)) {
        this.logger.error(`Unexpected error refreshing contacts for ${country}: ${describeError(error)}`, error instanceof Error ? error.stack : undefined);
      }
      return { ok: false, error };
    }
  }

  // A failed write never costs the caller the fresh result
  private store(country: string, contactSet: ContactSet): void {
    try {
      this.cache.put(country, contactSet);
      this.logger.log(`Cached fresh contacts for ${country}`);
    } catch (error) {
      this.logger.warn(`Could not cache contacts for ${country}: ${describeError(error)}`);
    }
  }

  private fallback(country: string, lookup: CacheLookup): ContactSet {
    if (lookup.status === "hit") {
      this.logger.warn(`Serving ${lookup.stale ? "stale " : ""}cached contacts for ${country}`);
      return lookup.contactSet;
    }
    this.logger.warn(`No cached contacts for ${country}, serving static default`);
    return buildDefaultContactSet(country);
  }

  private describeLookup(lookup: CacheLookup, options: GetContactsOptions): string {
    if (options.forceRefresh) return "forced refresh";
    switch (lookup.status) {
      case "hit":
        return `cache stale, ${Math.floor(lookup.ageMs / DAY_MS)} days old`;
      case "miss":
        return "no cache entry";
      case "unavailable":
        return "cache unavailable";
    }
  }
}
