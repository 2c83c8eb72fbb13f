import { Test, TestingModule } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { loadSosPolicy, SOS_POLICY } from "../../config/sos-policy.config";
import { DatabaseService } from "../database/database.service";
import { LlmService } from "../llm/llm.service";
import { ContactSearchService } from "../search/contact-search.service";
import { SEARCH_PROVIDER, SearchHit } from "../search/search-provider";
import { ContactCacheService } from "./contact-cache.service";
import { ContactExtractorService } from "./contact-extractor.service";
import { ContactValidatorService } from "./contact-validator.service";
import { CacheUnavailableError } from "./sos.errors";
import { SosService } from "./sos.service";
import { buildDefaultContactSet } from "./static-default";
import { ContactRecord, ContactSet, ValidationResult } from "./sos.types";

const DAY_MS = 24 * 60 * 60 * 1000;

const modelContacts = [
  { name: "Testland Emergency Services", phoneNumber: "112", category: "national_emergency", sourceUrl: "https://emergency.testland.gov/" },
  { name: "Testland Lifeline", phoneNumber: "0800 111 222", category: "crisis_hotline", sourceUrl: "https://lifeline.testland.org/" },
  { name: "Testland Youth Line", phoneNumber: "0800 333 444", category: "crisis_hotline", sourceUrl: "https://youthline.testland.org/" },
  { name: "Testland Health Helpline", phoneNumber: "1455", category: "crisis_hotline", sourceUrl: "https://health.testland.gov/helpline" },
  { name: "Samaritans Testland", phoneNumber: "116 123", category: "crisis_hotline", sourceUrl: "https://www.samaritans.org/testland" },
];

const cachedContacts = (country: string): ContactRecord[] => [
  { name: "Old Emergency Line", phoneNumber: "911", category: "national_emergency", sourceUrl: "https://old.testland.gov/", country },
  { name: "Old Lifeline", phoneNumber: "0800 000 001", category: "crisis_hotline", sourceUrl: "https://old-lifeline.testland.org/", country },
  { name: "Old Youth Line", phoneNumber: "0800 000 002", category: "crisis_hotline", sourceUrl: "https://old-youth.testland.org/", country },
  { name: "Old Health Line", phoneNumber: "0800 000 003", category: "crisis_hotline", sourceUrl: "https://old-health.testland.gov/", country },
  { name: "Old Samaritans", phoneNumber: "0800 000 004", category: "crisis_hotline", sourceUrl: "https://www.samaritans.org/old", country },
];

const cachedSet = (country: string, ageDays: number): ContactSet => ({
  country,
  contacts: cachedContacts(country),
  fetchedAt: new Date(Date.now() - ageDays * DAY_MS).toISOString(),
  origin: "fresh",
});

const searchHits: SearchHit[] = [
  { title: "Emergency numbers", snippet: "Dial 112 for police and ambulance", sourceUrl: "https://emergency.testland.gov/" },
  { title: "Testland Lifeline", snippet: "Call 0800 111 222, open 24/7", sourceUrl: "https://lifeline.testland.org/" },
];

const expectWellFormed = (set: ContactSet) => {
  expect(set.contacts).toHaveLength(5);
  expect(set.contacts.filter((c) => c.category === "national_emergency")).toHaveLength(1);
};

describe("SosService", () => {
  let module: TestingModule;
  let sos: SosService;
  let cache: ContactCacheService;
  let search: jest.Mock<Promise<SearchHit[]>, [string, AbortSignal?]>;
  let generateJson: jest.Mock<Promise<string>, [string, { temperature: number; timeoutMs: number }]>;

  const buildModule = async () => {
    module = await Test.createTestingModule({
      providers: [
        SosService,
        ContactCacheService,
        ContactExtractorService,
        ContactValidatorService,
        ContactSearchService,
        DatabaseService,
        { provide: SEARCH_PROVIDER, useValue: { search } },
        { provide: LlmService, useValue: { generateJson } },
        { provide: SOS_POLICY, useValue: loadSosPolicy() },
        {
          provide: ConfigService,
          useValue: new ConfigService({
            SOS_CACHE_DB_PATH: ":memory:",
            SOS_SEARCH_TIMEOUT_MS: 100,
            SOS_EXTRACTION_TIMEOUT_MS: 100,
          }),
        },
      ],
    }).compile();
    sos = module.get(SosService);
    cache = module.get(ContactCacheService);
  };

  beforeEach(async () => {
    search = jest.fn().mockResolvedValue(searchHits);
    generateJson = jest.fn().mockResolvedValue(JSON.stringify({ contacts: modelContacts }));
    await buildModule();
  });

  afterEach(async () => {
    await module.close();
  });

  test("fetches, caches and returns a fresh set when nothing is cached", async () => {
    const result = await sos.getEmergencyContacts("Testland");

    expect(result.origin).toBe("fresh");
    expect(result.country).toBe("Testland");
    expectWellFormed(result);
    expect(result.contacts.map((c) => c.phoneNumber)).toEqual(["112", "0800 111 222", "0800 333 444", "1455", "116 123"]);
    expect(search).toHaveBeenCalledTimes(3);
    expect(generateJson).toHaveBeenCalledTimes(1);

    const lookup = cache.get("Testland");
    expect(lookup.status).toBe("hit");
    if (lookup.status !== "hit") return;
    expect(lookup.contactSet).toEqual({ ...result, origin: "cached" });
  });

  test("serves a cache entry younger than 30 days without any external call", async () => {
    cache.put("Testland", cachedSet("Testland", 3));

    const result = await sos.getEmergencyContacts("Testland");

    expect(result.origin).toBe("cached");
    expect(result.contacts[0].name).toBe("Old Emergency Line");
    expect(search).not.toHaveBeenCalled();
    expect(generateJson).not.toHaveBeenCalled();
  });

  test("refreshes a 40-day-old entry when search works", async () => {
    cache.put("Testland", cachedSet("Testland", 40));

    const result = await sos.getEmergencyContacts("Testland");

    expect(result.origin).toBe("fresh");
    expect(result.contacts[0].name).toBe("Testland Emergency Services");
  });

  test("falls back to the 40-day-old entry when search fails", async () => {
    const stale = cachedSet("Testland", 40);
    cache.put("Testland", stale);
    search.mockRejectedValue(new Error("ECONNREFUSED"));

    const result = await sos.getEmergencyContacts("Testland");

    expect(result).toEqual({ ...stale, origin: "cached" });
    expect(generateJson).not.toHaveBeenCalled();
  });

  test("returns the static default for a never-seen country when search fails", async () => {
    search.mockRejectedValue(new Error("ECONNREFUSED"));

    const result = await sos.getEmergencyContacts("NeverSeen");

    expect(result.origin).toBe("default");
    expect(result.country).toBe("NeverSeen");
    expect(result.contacts).toEqual(buildDefaultContactSet("NeverSeen").contacts);
    expectWellFormed(result);
    expect(result.contacts.filter((c) => c.category === "crisis_hotline").map((c) => c.name)).toEqual([
      "Emergency 112 (crisis lines: findahelpline.com)",
      "Emergency 112 (support centres: befrienders.org)",
      "Emergency 112 (helpline list: iasp.info)",
      "Emergency 112 (guidance: who.int)",
    ]);
    expect(cache.get("NeverSeen")).toEqual({ status: "miss" });
  });

  test("falls back when the model cites an untrusted source and caches nothing", async () => {
    const contacts = modelContacts.map((c, i) => (i === 2 ? { ...c, sourceUrl: "https://example-blog.com/hotlines" } : c));
    generateJson.mockResolvedValue(JSON.stringify({ contacts }));

    const result = await sos.getEmergencyContacts("Testland");

    expect(result.origin).toBe("default");
    expect(cache.get("Testland")).toEqual({ status: "miss" });
  });

  test("falls back when the model reply is malformed", async () => {
    generateJson.mockResolvedValue("I could not find any contacts.");

    const result = await sos.getEmergencyContacts("Testland");

    expect(result.origin).toBe("default");
    expectWellFormed(result);
  });

  test("falls back when the model never answers", async () => {
    generateJson.mockReturnValue(new Promise<string>(() => undefined));

    const result = await sos.getEmergencyContacts("Testland");

    expect(result.origin).toBe("default");
  });

  test("still returns the fresh set when the cache write fails", async () => {
    jest.spyOn(cache, "put").mockImplementation(() => {
      throw new CacheUnavailableError("disk full");
    });

    const result = await sos.getEmergencyContacts("Testland");

    expect(result.origin).toBe("fresh");
    expectWellFormed(result);
  });

  test("treats an unavailable cache as a reason to fetch", async () => {
    jest.spyOn(cache, "get").mockReturnValue({ status: "unavailable", error: new CacheUnavailableError("locked") });

    const result = await sos.getEmergencyContacts("Testland");

    expect(result.origin).toBe("fresh");
    expect(search).toHaveBeenCalledTimes(3);
  });

  test("serves the default when the cache is unavailable and search fails", async () => {
    jest.spyOn(cache, "get").mockReturnValue({ status: "unavailable", error: new CacheUnavailableError("locked") });
    search.mockRejectedValue(new Error("ECONNREFUSED"));

    const result = await sos.getEmergencyContacts("Testland");

    expect(result.origin).toBe("default");
  });

  test("never returns a cached row that breaks the 5-contact shape", async () => {
    const hotlinesOnly = cachedContacts("Testland").slice(1);
    module
      .get(DatabaseService)
      .db.prepare("INSERT INTO sos_contact_cache (country_key, country, contacts_json, fetched_at, written_at, origin) VALUES (?, ?, ?, ?, ?, ?)")
      .run("testland", "Testland", JSON.stringify(hotlinesOnly), new Date().toISOString(), new Date().toISOString(), "fresh");
    search.mockRejectedValue(new Error("ECONNREFUSED"));

    const result = await sos.getEmergencyContacts("Testland");

    expect(result.origin).toBe("default");
    expectWellFormed(result);
  });

  test("forced refresh bypasses a fresh cache entry", async () => {
    cache.put("Testland", cachedSet("Testland", 1));

    const result = await sos.getEmergencyContacts("Testland", { forceRefresh: true });

    expect(result.origin).toBe("fresh");
    expect(search).toHaveBeenCalledTimes(3);
  });

  test("forced refresh keeps the cached entry when the fetch fails", async () => {
    cache.put("Testland", cachedSet("Testland", 1));
    search.mockRejectedValue(new Error("ECONNREFUSED"));

    const result = await sos.getEmergencyContacts("Testland", { forceRefresh: true });

    expect(result.origin).toBe("cached");
    expect(result.contacts[0].name).toBe("Old Emergency Line");
  });

  test("shares one fetch between concurrent callers for the same country", async () => {
    const [first, second] = await Promise.all([
      sos.getEmergencyContacts("Testland"),
      sos.getEmergencyContacts("  testland "),
    ]);

    expect(search).toHaveBeenCalledTimes(3);
    expect(generateJson).toHaveBeenCalledTimes(1);
    expect(first).toEqual(second);
  });

  test("fetches different countries independently", async () => {
    await Promise.all([sos.getEmergencyContacts("Testland"), sos.getEmergencyContacts("Otherland")]);

    expect(search).toHaveBeenCalledTimes(6);
    expect(generateJson).toHaveBeenCalledTimes(2);
  });

  test("uses the default country for an empty request", async () => {
    search.mockRejectedValue(new Error("ECONNREFUSED"));

    const result = await sos.getEmergencyContacts("   ");

    expect(result.country).toBe("India");
    expect(result.origin).toBe("default");
  });

  test("accepts its own static default at start-up", () => {
    expect(() => sos.assertDefaultIsValid()).not.toThrow();
  });

  test("bounds a run by the sum of the stage timeouts plus a margin", () => {
    expect(sos.deadlineMs).toBe(1200);
  });
});

describe("SosService with a misbehaving extraction stage", () => {
  let module: TestingModule;

  afterEach(async () => {
    await module.close();
  });

  test("rejects a 4-contact candidate with count_mismatch and serves the cache instead", async () => {
    const fourContacts: ContactSet = {
      country: "Testland",
      contacts: cachedContacts("Testland").slice(0, 4),
      fetchedAt: new Date().toISOString(),
      origin: "fresh",
    };
    const extract = jest.fn().mockResolvedValue(fourContacts);

    module = await Test.createTestingModule({
      providers: [
        SosService,
        ContactCacheService,
        ContactExtractorService,
        ContactValidatorService,
        ContactSearchService,
        DatabaseService,
        { provide: SEARCH_PROVIDER, useValue: { search: jest.fn().mockResolvedValue(searchHits) } },
        { provide: LlmService, useValue: { generateJson: jest.fn() } },
        { provide: SOS_POLICY, useValue: loadSosPolicy() },
        { provide: ConfigService, useValue: new ConfigService({ SOS_CACHE_DB_PATH: ":memory:" }) },
      ],
    })
      .overrideProvider(ContactExtractorService)
      .useValue({ extract, timeoutMs: 100 })
      .compile();

    const sos = module.get(SosService);
    const cache = module.get(ContactCacheService);
    const validator = module.get(ContactValidatorService);
    const validate = jest.spyOn(validator, "validate");
    cache.put("Testland", cachedSet("Testland", 40));

    const result = await sos.getEmergencyContacts("Testland");

    expect(extract).toHaveBeenCalledTimes(1);
    const verdict: ValidationResult = validate.mock.results[0].value;
    expect(verdict.valid === false && verdict.error.reason).toBe("count_mismatch");
    expect(result.origin).toBe("cached");
    expectWellFormed(result);
  });
});

describe("SosService overall deadline", () => {
  let module: TestingModule;
  let extract: jest.Mock<Promise<ContactSet>, [unknown, string, number]>;

  const freshSet: ContactSet = {
    country: "Testland",
    contacts: cachedContacts("Testland").map((c) => ({ ...c, name: c.name.replace("Old", "Late") })),
    fetchedAt: new Date().toISOString(),
    origin: "fresh",
  };

  beforeEach(async () => {
    extract = jest.fn();
    module = await Test.createTestingModule({
      providers: [
        SosService,
        ContactCacheService,
        ContactExtractorService,
        ContactValidatorService,
        ContactSearchService,
        DatabaseService,
        { provide: SEARCH_PROVIDER, useValue: { search: jest.fn().mockResolvedValue(searchHits) } },
        { provide: LlmService, useValue: { generateJson: jest.fn() } },
        { provide: SOS_POLICY, useValue: loadSosPolicy() },
        {
          provide: ConfigService,
          useValue: new ConfigService({ SOS_CACHE_DB_PATH: ":memory:", SOS_SEARCH_TIMEOUT_MS: 50 }),
        },
      ],
    })
      .overrideProvider(ContactExtractorService)
      .useValue({ extract, timeoutMs: 50 })
      .compile();
  });

  afterEach(async () => {
    await module.close();
  });

  test("serves the default once the deadline passes on a stage that never settles", async () => {
    extract.mockReturnValue(new Promise<ContactSet>(() => undefined));
    const sos = module.get(SosService);
    expect(sos.deadlineMs).toBe(1100);

    const startedAt = Date.now();
    const result = await sos.getEmergencyContacts("Testland");
    const elapsed = Date.now() - startedAt;

    expect(result.origin).toBe("default");
    expectWellFormed(result);
    expect(elapsed).toBeGreaterThanOrEqual(1050);
    expect(elapsed).toBeLessThan(3000);
  });

  test("lets a run that outlives the deadline still fill the cache", async () => {
    let finishExtraction: (set: ContactSet) => void = () => undefined;
    extract.mockReturnValue(
      new Promise<ContactSet>((resolve) => {
        finishExtraction = resolve;
      })
    );
    const sos = module.get(SosService);
    const cache = module.get(ContactCacheService);

    const result = await sos.getEmergencyContacts("Testland");
    expect(result.origin).toBe("default");
    expect(cache.get("Testland")).toEqual({ status: "miss" });

    finishExtraction(freshSet);
    await new Promise((resolve) => setImmediate(resolve));

    const lookup = cache.get("Testland");
    expect(lookup.status).toBe("hit");
    if (lookup.status !== "hit") return;
    expect(lookup.contactSet.contacts[0].name).toBe("Late Emergency Line");
    expect(lookup.contactSet.origin).toBe("cached");
  });
});
