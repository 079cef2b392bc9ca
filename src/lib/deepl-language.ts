/**
 * A DeepL language code, e.g. `DE` or `EN-GB`.
 *
 * The set of codes DeepL accepts grows independently of this package, so any
 * string is allowed. The constants in {@link Languages} cover the documented set.
 */
export type Language = (typeof Languages)[keyof typeof Languages] | (string & Record<never, never>);

export const Languages = {
  Arabic: 'AR',
  Bulgarian: 'BG',
  ChineseSimplified: 'ZH-HANS',
  ChineseTraditional: 'ZH-HANT',
  Czech: 'CS',
  Danish: 'DA',
  Dutch: 'NL',
  EnglishAmerican: 'EN-US',
  EnglishBritish: 'EN-GB',
  Estonian: 'ET',
  Finnish: 'FI',
  French: 'FR',
  German: 'DE',
  Greek: 'EL',
  Hungarian: 'HU',
  Indonesian: 'ID',
  Italian: 'IT',
  Japanese: 'JA',
  Korean: 'KO',
  Latvian: 'LV',
  Lithuanian: 'LT',
  NorwegianBokmal: 'NB',
  Polish: 'PL',
  PortugueseBrazil: 'PT-BR',
  PortuguesePortugal: 'PT-PT',
  Romanian: 'RO',
  Russian: 'RU',
  Slovak: 'SK',
  Slovenian: 'SL',
  Spanish: 'ES',
  Swedish: 'SV',
  Turkish: 'TR',
  Ukrainian: 'UK',

  /** English (unspecified). Use as a source language only; target EN-US or EN-GB instead. */
  English: 'EN',
  /** Portuguese (unspecified). Use as a source language only; target PT-BR or PT-PT instead. */
  Portuguese: 'PT',
  /** Chinese (unspecified). Use as a source language only; target ZH-HANS or ZH-HANT instead. */
  Chinese: 'ZH',
} as const;
