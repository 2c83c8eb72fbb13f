import { z } from "zod";
import { CONTACT_COUNT, NATIONAL_EMERGENCY_COUNT } from "./sos.types";

export const contactCategorySchema = z.enum(["national_emergency", "crisis_hotline"]);

export const contactRecordSchema = z.object({
  name: z.string(),
  phoneNumber: z.string(),
  category: contactCategorySchema,
  sourceUrl: z.string(),
  country: z.string(),
  description: z.string().optional(),
});

// A stored set must still be a complete set: 5 records, exactly 1 national emergency number
export const cachedContactsSchema = z
  .array(contactRecordSchema)
  .length(CONTACT_COUNT)
  .refine((contacts) => contacts.filter((c) => c.category === "national_emergency").length === NATIONAL_EMERGENCY_COUNT, {
    message: `expected exactly ${NATIONAL_EMERGENCY_COUNT} national_emergency contact`,
  });

// Shape the extraction model is asked to return; country is stamped afterwards
export const extractedContactsSchema = z.object({
  contacts: z.array(
    z.object({
      name: z.string(),
      phoneNumber: z.string(),
      category: contactCategorySchema,
      sourceUrl: z.string(),
      description: z.string().nullish(),
    })
  ),
});

export type ExtractedContacts = z.infer<typeof extractedContactsSchema>;
