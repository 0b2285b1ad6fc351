export const SUPPORTED_COUNTRIES = ["egypt", "jordan", "uae", "saudi", "kuwait"] as const;
export type Country = (typeof SUPPORTED_COUNTRIES)[number];

export const LAW_TYPES = [
  "criminal",
  "civil",
  "commercial",
  "economic",
  "administrative",
  "arbitration",
  "labor",
  "personal_status"
] as const;
export type LawType = (typeof LAW_TYPES)[number];

export const COUNTRY_DISPLAY_NAMES: Record<Country, string> = {
  egypt: "مصر",
  jordan: "الأردن",
  uae: "الإمارات",
  saudi: "السعودية",
  kuwait: "الكويت"
};

export const LAW_TYPE_DISPLAY_NAMES: Record<LawType, string> = {
  criminal: "جنائي",
  civil: "مدني",
  commercial: "تجاري",
  economic: "اقتصادي",
  administrative: "إداري",
  arbitration: "تحكيم",
  labor: "عمل",
  personal_status: "أحوال شخصية"
};

export const isSupportedCountry = (value: string): value is Country =>
  SUPPORTED_COUNTRIES.some((country) => country === value);

export const isLawType = (value: string): value is LawType =>
  LAW_TYPES.some((lawType) => lawType === value);

export const collectionNameFor = (prefix: string, country: Country): string => `${prefix}_${country}`;
