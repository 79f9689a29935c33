/**
 * Content/time splitting for "/todo add 明天下午三点 交报告" style input,
 * where the time expression comes first and the task text follows
 */

import { parseTime } from './time-parser.js';

export interface SplitResult {
  content: string;
  time: Date | null;
}

export interface ContentTimeSplitter {
  split(text: string, referenceTime?: Date): SplitResult;
}

/**
 * Grows a whitespace-separated prefix one word at a time and keeps the longest
 * prefix that parses as a time
 */
export const prefixSplitter: ContentTimeSplitter = {
  split(text, referenceTime = new Date()) {
    const trimmed = text.trim();
    const words = trimmed.split(/\s+/).filter(Boolean);

    if (words.length <= 1) {
      return { content: trimmed, time: null };
    }

    let bestSplit = 0;
    let bestTime: Date | null = null;

    // The last word always stays as content
    for (let i = 1; i < words.length; i++) {
      const parsed = parseTime(words.slice(0, i).join(' '), referenceTime);
      if (parsed) {
        bestSplit = i;
        bestTime = parsed;
      }
    }

    if (bestTime) {
      const content = words.slice(bestSplit).join(' ');
      if (content) {
        return { content, time: bestTime };
      }
    }

    return { content: trimmed, time: null };
  },
};

export function splitContentAndTime(
  text: string,
  referenceTime: Date = new Date(),
  splitter: ContentTimeSplitter = prefixSplitter,
): SplitResult {
  return splitter.split(text, referenceTime);
}
