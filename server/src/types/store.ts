export const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** Normalized, flattened representation of one physical store. */
export interface StoreRecord {
  /** Provider entity id; unique within one scan's output. */
  store_id: string;
  name: string;
  store_type: string;
  street_address: string;
  city: string;
  state: string;
  postal_code: string;
  country: string;
  latitude: number | null;
  longitude: number | null;
  phone: string;
  url: string | null;
  /** `"HH:MM-HH:MM"` or `""` */
  hours_monday: string;
  hours_tuesday: string;
  hours_wednesday: string;
  hours_thursday: string;
  hours_friday: string;
  hours_saturday: string;
  hours_sunday: string;
  closed: boolean;
  /** ISO-8601, set when the record was normalized */
  scraped_at: string;
}
