import { z } from "zod";

/**
 * Response shapes of the Ticketmaster Discovery v2 API.
 *
 * Only the fields the extractors read are declared; all of them are optional
 * because the vendor omits whole sub-objects (venues, classifications, price
 * ranges) for many listings. `null` is accepted wherever the vendor sends it.
 */

const NamedSchema = z.object({ name: z.string().nullish() }).passthrough();

export const DateStampSchema = z
  .object({
    localDate: z.string().nullish(),
    localTime: z.string().nullish(),
    dateTime: z.string().nullish(),
  })
  .passthrough();

export const VenueSchema = z
  .object({
    name: z.string().nullish(),
    postalCode: z.string().nullish(),
    address: z.object({ line1: z.string().nullish() }).passthrough().nullish(),
    city: NamedSchema.nullish(),
    state: z.object({ stateCode: z.string().nullish() }).passthrough().nullish(),
    country: z.object({ countryCode: z.string().nullish() }).passthrough().nullish(),
  })
  .passthrough();

export const ClassificationSchema = z
  .object({
    segment: NamedSchema.nullish(),
    genre: NamedSchema.nullish(),
    subGenre: NamedSchema.nullish(),
  })
  .passthrough();

export const PriceRangeSchema = z
  .object({
    type: z.string().nullish(),
    currency: z.string().nullish(),
    min: z.number().nullish(),
    max: z.number().nullish(),
  })
  .passthrough();

export const TicketmasterEventSchema = z
  .object({
    id: z.string().nullish(),
    name: z.string().nullish(),
    url: z.string().nullish(),
    dates: z
      .object({
        start: DateStampSchema.nullish(),
        end: DateStampSchema.nullish(),
        timezone: z.string().nullish(),
        status: z.object({ code: z.string().nullish() }).passthrough().nullish(),
      })
      .passthrough()
      .nullish(),
    classifications: z.array(ClassificationSchema).nullish(),
    priceRanges: z.array(PriceRangeSchema).nullish(),
    sales: z
      .object({
        public: z
          .object({
            startDateTime: z.string().nullish(),
            endDateTime: z.string().nullish(),
            startTBD: z.boolean().nullish(),
          })
          .passthrough()
          .nullish(),
      })
      .passthrough()
      .nullish(),
    _embedded: z
      .object({ venues: z.array(VenueSchema).nullish() })
      .passthrough()
      .nullish(),
  })
  .passthrough();

/**
 * Envelope of GET /events. Events stay `unknown` here and are validated one
 * by one, so a single odd listing does not discard the whole page.
 */
export const EventSearchPageSchema = z
  .object({
    _embedded: z
      .object({ events: z.array(z.unknown()).default([]) })
      .passthrough()
      .optional(),
    page: z
      .object({
        size: z.number().optional(),
        totalElements: z.number().optional(),
        totalPages: z.number().optional(),
        number: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type TicketmasterEvent = z.infer<typeof TicketmasterEventSchema>;
export type Venue = z.infer<typeof VenueSchema>;
export type PriceRange = z.infer<typeof PriceRangeSchema>;
