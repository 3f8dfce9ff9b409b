export interface TitlePattern {
  /** Prefix, marker and suffix normalized; siblings share it. */
  key: string;
  kind: 'number' | 'date';
  value: number;
}

const CHINESE_DIGITS: Record<string, number> = {
  零: 0, 〇: 0, 一: 1, 二: 2, 两: 2, 三: 3, 四: 4, 五: 5, 六: 6, 七: 7, 八: 8, 九: 9,
};

function parseNumber(text: string): number | null {
  if (/^\d+$/.test(text)) {
    return Number(text);
  }

  let total = 0;
  let current = 0;
  for (const char of text) {
    const digit = CHINESE_DIGITS[char];
    if (digit !== undefined) {
      current = digit;
    } else if (char === '十') {
      total += (current || 1) * 10;
      current = 0;
    } else if (char === '百') {
      total += (current || 1) * 100;
      current = 0;
    } else {
      return null;
    }
  }
  return total + current;
}

function normalize(text: string): string {
  return text.toLowerCase().replace(/[\s\-_:：|·,，.。!！?？【】[\]「」"'“”]+/g, ' ').trim();
}

interface Rule {
  marker: string;
  pattern: RegExp;
  kind: TitlePattern['kind'];
}

// order matters: dates before the bare trailing number
const RULES: Rule[] = [
  { marker: 'date', kind: 'date', pattern: /^(.*?)(\d{4})[-./年]?(\d{2})[-./月]?(\d{2})日?(.*)$/ },
  { marker: '#', kind: 'number', pattern: /^(.*?)#\s*(\d+)(.*)$/ },
  { marker: 'paren', kind: 'number', pattern: /^(.*?)[（(]\s*(\d+)\s*[)）](.*)$/ },
  { marker: 'ordinal', kind: 'number', pattern: /^(.*?)第\s*([\d零〇一二两三四五六七八九十百]+)\s*([期篇章集讲回])(.*)$/ },
  { marker: 'vol', kind: 'number', pattern: /^(.*?)\bvol\.?\s*(\d+)(.*)$/i },
  { marker: 'part', kind: 'number', pattern: /^(.*?)\bpart\s*(\d+)(.*)$/i },
  { marker: 'ep', kind: 'number', pattern: /^(.*?)\bep\.?\s*(\d+)(.*)$/i },
  { marker: 'trailing', kind: 'number', pattern: /^(.*?\D)\s*(\d+)\s*$/ },
];

export function parseTitlePattern(title: string): TitlePattern | null {
  const trimmed = title.trim();
  for (const rule of RULES) {
    const match = trimmed.match(rule.pattern);
    if (!match) continue;

    let value: number | null;
    let marker = rule.marker;
    let suffix: string;
    if (rule.kind === 'date') {
      const [, , year, month, day, rest] = match;
      const monthNumber = Number(month);
      const dayNumber = Number(day);
      if (monthNumber < 1 || monthNumber > 12 || dayNumber < 1 || dayNumber > 31) continue;
      value = Number(`${year}${month}${day}`);
      suffix = rest;
    } else if (rule.marker === 'ordinal') {
      value = parseNumber(match[2]);
      marker = `ordinal-${match[3]}`;
      suffix = match[4];
    } else {
      value = parseNumber(match[2]);
      suffix = match[3] ?? '';
    }

    const prefix = normalize(match[1]);
    if (value === null || prefix.length < 2) continue;

    return {
      key: `${rule.kind}|${marker}|${prefix}|${normalize(suffix)}`,
      kind: rule.kind,
      value,
    };
  }
  return null;
}

/** Same series key, different position: the heuristic's notion of a sibling. */
export function isSeriesSibling(reference: TitlePattern | null, title: string): boolean {
  if (!reference) return false;
  const other = parseTitlePattern(title);
  return other !== null && other.key === reference.key && other.value !== reference.value;
}
