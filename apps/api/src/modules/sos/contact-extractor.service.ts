import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { SOS_POLICY, SosPolicy } from "../../config/sos-policy.config";
import { withTimeout } from "../../common/utils/with-timeout";
import { LlmService } from "../llm/llm.service";
import { describeError, ExtractionFailedError } from "./sos.errors";
import { ExtractedContacts, extractedContactsSchema } from "./sos.schemas";
import { CONTACT_COUNT, ContactRecord, ContactSet, RawSearchResults, SearchSnippet } from "./sos.types";

// Consistency over creativity
const EXTRACTION_TEMPERATURE = 0.1;

@Injectable()
export class ContactExtractorService {
  private readonly logger = new Logger(ContactExtractorService.name);
  readonly timeoutMs: number;

  constructor(
    private readonly llm: LlmService,
    @Inject(SOS_POLICY) private readonly policy: SosPolicy,
    private readonly configService: ConfigService
  ) {
    this.timeoutMs = this.configService.get<number>("SOS_EXTRACTION_TIMEOUT_MS") ?? 20000;
  }

  /**
   * Turn raw search snippets into a candidate contact set.
   * Every failure surfaces as ExtractionFailedError.
   */
  async extract(raw: RawSearchResults, country: string, currentYear: number): Promise<ContactSet> {
    const prompt = this.buildPrompt(country, currentYear, this.prepareSearchSummary(raw.snippets));

    let reply: string;
    try {
      reply = await withTimeout(
        this.llm.generateJson(prompt, { temperature: EXTRACTION_TEMPERATURE, timeoutMs: this.timeoutMs }),
        this.timeoutMs,
        () => new ExtractionFailedError(`Extraction for "${country}" timed out after ${this.timeoutMs}ms`)
      );
    } catch (error) {
      if (error instanceof ExtractionFailedError) throw error;
      throw new ExtractionFailedError(`Language model call failed for "${country}": ${describeError(error)}`, { cause: error });
    }

    return this.parseReply(reply, country);
  }

  /**
   * Numbered title/snippet/link blocks, capped at the policy's evidence size
   */
  prepareSearchSummary(snippets: SearchSnippet[]): string {
    return snippets
      .slice(0, this.policy.maxEvidenceSnippets)
      .map((s, idx) => `${idx + 1}. ${s.title}\n   ${s.snippet}\n   ${s.sourceUrl}\n`)
      .join("\n");
  }

  buildPrompt(country: string, currentYear: number, searchSummary: string): string {
    const suffixes = this.policy.trustedDomainSuffixes.map((s) => `.${s}`).join(", ");

    return `You are an emergency contact information specialist.

Task: Extract EXACTLY ${CONTACT_COUNT} emergency and crisis contacts for ${country} from the search results below.

CRITICAL Requirements:
1. The first contact MUST be the national emergency number, with category "national_emergency" (e.g., 112 for India, 911 for USA, 999 for UK)
2. The next ${CONTACT_COUNT - 1} contacts MUST be mental health crisis hotlines (suicide prevention, crisis support), with category "crisis_hotline"
3. Exactly ONE contact may have category "national_emergency"
4. Every sourceUrl MUST be an official page from the search results whose domain ends in one of: ${suffixes}
5. Only include information corroborated as current for ${currentYear}; skip anything outdated or unverified
6. Do not invent numbers or URLs that are not in the search results

Output ONLY valid JSON in this EXACT format (no markdown, no code blocks):
{
  "contacts": [
    {
      "name": "National Emergency Number",
      "phoneNumber": "112",
      "category": "national_emergency",
      "sourceUrl": "https://112.gov.in/",
      "description": "National emergency response system for all emergencies"
    },
    {
      "name": "Organization Name",
      "phoneNumber": "+XX-XXXXXXXXXX",
      "category": "crisis_hotline",
      "sourceUrl": "https://example.org/",
      "description": "Brief description of services"
    }
  ]
}

Search Results:
${searchSummary}

Extract EXACTLY ${CONTACT_COUNT} contacts in valid JSON format:`;
  }

  /**
   * Parse a model reply into a fresh candidate set. Accepts replies wrapped in
   * Markdown code fences. Empty strings pass through; validation rejects them.
   */
  parseReply(responseText: string, country: string, now: Date = new Date()): ContactSet {
    const cleaned = responseText
      .trim()
      .replace(/^```(?:json)?\s*/i, "")
      .replace(/\s*```$/, "")
      .trim();

    let parsed: unknown;
    try {
      parsed = JSON.parse(cleaned);
    } catch (error) {
      this.logger.warn(`Unparsable extraction reply: ${responseText.substring(0, 200)}`);
      throw new ExtractionFailedError(`Extraction reply is not valid JSON: ${describeError(error)}`, { cause: error });
    }

    const result = extractedContactsSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ExtractionFailedError(
        `Extraction reply has the wrong shape: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown issue"}`
      );
    }

    const { contacts } = result.data;
    if (contacts.length !== CONTACT_COUNT) {
      throw new ExtractionFailedError(`Extraction returned ${contacts.length} contacts, expected ${CONTACT_COUNT}`);
    }

    return {
      country,
      contacts: nationalFirst(contacts.map((c) => toRecord(c, country))),
      fetchedAt: now.toISOString(),
      origin: "fresh",
    };
  }
}

function toRecord(contact: ExtractedContacts["contacts"][number], country: string): ContactRecord {
  const record: ContactRecord = {
    name: contact.name.trim(),
    phoneNumber: contact.phoneNumber.trim(),
    category: contact.category,
    sourceUrl: contact.sourceUrl.trim(),
    country,
  };
  const description = contact.description?.trim();
  if (description) record.description = description;
  return record;
}

function nationalFirst(contacts: ContactRecord[]): ContactRecord[] {
  return [
    ...contacts.filter((c) => c.category === "national_emergency"),
    ...contacts.filter((c) => c.category !== "national_emergency"),
  ];
}
