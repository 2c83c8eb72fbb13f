/**
 * Last-resort contacts served when there is neither a fresh fetch nor a cached entry.
 * 112 is the international emergency number reachable from most mobile phones; the
 * four hotline entries point at international crisis-line directories.
 */

import { ContactRecord, ContactSet } from "./sos.types";

const DEFAULT_CONTACTS: ReadonlyArray<Omit<ContactRecord, "country">> = [
  {
    name: "International Emergency Number",
    phoneNumber: "112",
    category: "national_emergency",
    sourceUrl: "https://www.itu.int/",
    description: "Works from most mobile phones worldwide. If it fails, dial your local emergency number (e.g. 911 or 999).",
  },
  {
    name: "Emergency 112 (crisis lines: findahelpline.com)",
    phoneNumber: "112",
    category: "crisis_hotline",
    sourceUrl: "https://findahelpline.com/",
    description: "Directory of free, confidential crisis lines by country. Call 112 if you are in immediate danger.",
  },
  {
    name: "Emergency 112 (support centres: befrienders.org)",
    phoneNumber: "112",
    category: "crisis_hotline",
    sourceUrl: "https://www.befrienders.org/",
    description: "Emotional support centres worldwide. Call 112 if you are in immediate danger.",
  },
  {
    name: "Emergency 112 (helpline list: iasp.info)",
    phoneNumber: "112",
    category: "crisis_hotline",
    sourceUrl: "https://www.iasp.info/crisis-centres-helplines/",
    description: "International Association for Suicide Prevention helpline list. Call 112 if you are in immediate danger.",
  },
  {
    name: "Emergency 112 (guidance: who.int)",
    phoneNumber: "112",
    category: "crisis_hotline",
    sourceUrl: "https://www.who.int/health-topics/mental-health",
    description: "World Health Organization mental health guidance. Call 112 if you are in immediate danger.",
  },
];

export function buildDefaultContactSet(country: string, now: Date = new Date()): ContactSet {
  return {
    country,
    contacts: DEFAULT_CONTACTS.map((contact) => ({ ...contact, country })),
    fetchedAt: now.toISOString(),
    origin: "default",
  };
}
