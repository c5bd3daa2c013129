import axios from 'axios';
import type { EnvConfig } from '../config/env.js';
import { NotificationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface NewChapterNotice {
  workTitle: string;
  chapterNumber: string;
  chapterTitle: string | null;
  url: string;
  sourceName: string;
  detectedAt: Date;
}

export interface Notifier {
  notifyNewChapters(chapters: NewChapterNotice[]): Promise<void>;
}

const MAX_EMBEDS = 10;
const NEW_CHAPTER_COLOR = 0x00ff00;
const SUMMARY_COLOR = 0x0099ff;

interface DiscordEmbed {
  title: string;
  url?: string;
  description: string;
  color: number;
  timestamp?: string;
  footer?: { text: string };
}

export interface DiscordPayload {
  content: string;
  embeds: DiscordEmbed[];
}

export function buildDiscordPayload(chapters: NewChapterNotice[]): DiscordPayload {
  // Discord rejects more than MAX_EMBEDS embeds, the summary included.
  const overflow = chapters.length > MAX_EMBEDS;
  const shown = overflow ? chapters.slice(0, MAX_EMBEDS - 1) : chapters;

  const embeds: DiscordEmbed[] = shown.map((chapter) => ({
    title: `${chapter.workTitle} - Chapter ${chapter.chapterNumber}`,
    url: chapter.url,
    description: chapter.chapterTitle || 'New chapter available',
    color: NEW_CHAPTER_COLOR,
    timestamp: chapter.detectedAt.toISOString(),
    footer: { text: `Source: ${chapter.sourceName}` },
  }));

  if (overflow) {
    embeds.push({
      title: 'And more...',
      description: `${chapters.length - shown.length} additional chapters detected`,
      color: SUMMARY_COLOR,
    });
  }

  return {
    content: `**${chapters.length} new chapter(s) detected!**`,
    embeds,
  };
}

export class DiscordNotifier implements Notifier {
  constructor(
    private readonly webhookUrl: string,
    private readonly timeoutMs: number = 10000,
  ) {}

  async notifyNewChapters(chapters: NewChapterNotice[]): Promise<void> {
    if (chapters.length === 0) {
      logger.info('No new chapters to notify');
      return;
    }

    try {
      await axios.post(this.webhookUrl, buildDiscordPayload(chapters), { timeout: this.timeoutMs });
      logger.info({ count: chapters.length }, 'Discord notification sent');
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Failed to send Discord notification');
      throw new NotificationError(`Discord webhook failed: ${errorMessage(error)}`, { count: chapters.length });
    }
  }
}

export function createNotifier(env: Pick<EnvConfig, 'NOTIFICATION_TYPE' | 'DISCORD_WEBHOOK_URL'>): Notifier | undefined {
  if (env.NOTIFICATION_TYPE === 'none') {
    return undefined;
  }

  if (!env.DISCORD_WEBHOOK_URL) {
    logger.warn('DISCORD_WEBHOOK_URL not configured, notifications disabled');
    return undefined;
  }

  return new DiscordNotifier(env.DISCORD_WEBHOOK_URL);
}
