import { FingerprintProfile } from '../types/crawl';

export const MOBILE_PROFILES: readonly FingerprintProfile[] = [
  {
    name: 'iphone-14',
    userAgent:
      'Mozilla/5.0 (iPhone; CPU iPhone OS 16_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Mobile/15E148 MicroMessenger/8.0.40(0x18002831) NetType/WIFI Language/zh_CN',
    viewport: { width: 390, height: 844 },
    deviceScaleFactor: 3,
    platform: 'iPhone',
  },
  {
    name: 'iphone-x',
    userAgent:
      'Mozilla/5.0 (iPhone; CPU iPhone OS 15_4 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Mobile/15E148 MicroMessenger/8.0.38(0x1800262c) NetType/4G Language/zh_CN',
    viewport: { width: 375, height: 812 },
    deviceScaleFactor: 3,
    platform: 'iPhone',
  },
  {
    name: 'galaxy-s21',
    userAgent:
      'Mozilla/5.0 (Linux; Android 13; SM-G991B) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/112.0.0.0 Mobile Safari/537.36 MicroMessenger/8.0.40.2560(0x28002837) NetType/WIFI Language/zh_CN',
    viewport: { width: 360, height: 800 },
    deviceScaleFactor: 3,
    platform: 'Linux armv8l',
  },
  {
    name: 'pixel-6',
    userAgent:
      'Mozilla/5.0 (Linux; Android 12; Pixel 6) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/114.0.0.0 Mobile Safari/537.36 MicroMessenger/8.0.40.2560(0x28002837) NetType/WIFI Language/zh_CN',
    viewport: { width: 412, height: 915 },
    deviceScaleFactor: 2.625,
    platform: 'Linux armv8l',
  },
];

export function pickProfile(random: () => number = Math.random): FingerprintProfile {
  return MOBILE_PROFILES[Math.floor(random() * MOBILE_PROFILES.length) % MOBILE_PROFILES.length];
}
