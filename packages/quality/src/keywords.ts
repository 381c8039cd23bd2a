/** Dream-interpretation vocabulary used by the content quality score. */
export const DREAM_KEYWORDS: readonly string[] = [
  'rüya',
  'rüyada',
  'görmek',
  'tabir',
  'yorumlanır',
  'delalet',
  'işaret',
  'anlam',
  'düşman',
  'hayır',
  'şer',
  'bereket',
  'rızk',
  'manevi',
  'maddi',
  'hane',
  'zarar',
  'fayda',
  'hayırlı',
];

/** Platform and scraping artifacts; each one found costs points. */
export const NOISE_MARKERS: readonly string[] = [
  'netcore',
  'seo',
  'amp',
  'milliyet',
  'pembenar',
  'çok fazla tekrar',
  'anlamsız',
  'test',
];

export const TRADITIONAL_INDICATORS: readonly string[] = [
  'alim',
  'tabir',
  'delalet',
  'işaret',
  'imam',
  'diyanet',
  'islami',
  'geleneksel',
  'halk',
  'kültür',
  'türk',
];

export const RELIGIOUS_KEYWORDS: readonly string[] = [
  'allah',
  'peygamber',
  'dua',
  'namaz',
  'haram',
  'helal',
  'sevap',
  'günah',
  'ahiret',
  'cennet',
  'cehennem',
];

export function countContained(text: string, keywords: readonly string[]): number {
  return keywords.reduce((count, keyword) => (text.includes(keyword) ? count + 1 : count), 0);
}
