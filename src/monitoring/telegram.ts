import TelegramBot from 'node-telegram-bot-api';
import type { RankingReport } from '../backtest/ranking.js';
import type { SignalAlert } from '../signals/types.js';
import { chunkText, escapeHtml, formatPercent, formatRatio, formatSignedPct } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('telegram');

/** Telegram rejects messages over 4096 characters. */
export const TELEGRAM_MESSAGE_LIMIT = 4096;
const CHUNK_LIMIT = 4000;

export interface TelegramOptions {
  token?: string;
  chatId?: string;
}

const ACTION_EMOJI: Readonly<Record<SignalAlert['action'], string>> = {
  BUY: '🟢',
  SELL: '🔴',
  WATCH: '👀',
};

export function formatAlertMessage(alerts: readonly SignalAlert[], title = 'Daily Signals'): string {
  if (alerts.length === 0) {
    return `<b>${escapeHtml(title)}</b>\n\nNo signals today.`;
  }

  const lines: string[] = [`<b>${escapeHtml(title)}</b> (${alerts.length})`, ''];
  for (const a of alerts) {
    lines.push(
      `${ACTION_EMOJI[a.action]} <b>${a.action} ${escapeHtml(a.symbol)}</b> @ $${a.close.toFixed(2)} [${a.confidence}]`,
    );
    lines.push(
      `   ${escapeHtml(a.strategyName)} | WR ${formatPercent(a.winRate)} | ` +
        `Ret ${formatSignedPct(a.totalReturnPct)} | ${a.closedTrades} trades`,
    );
    lines.push(`   <i>${escapeHtml(a.reason)}</i>`);
  }
  return lines.join('\n');
}

export function formatRankingMessage(report: RankingReport, top = 10): string {
  const lines: string[] = [
    `<b>🏆 Strategy Ranking: ${escapeHtml(report.symbol)}</b>`,
    `By ${report.metric}, min ${report.minimumTrades} trades`,
    '',
  ];

  if (report.ranked.length === 0) {
    lines.push('No strategy produced enough trades to rank.');
  }
  for (const o of report.ranked.slice(0, top)) {
    const m = o.result.metrics;
    lines.push(
      `${o.rank}. <b>${escapeHtml(o.strategyName)}</b>: ${formatSignedPct(m.totalReturnPct)} | ` +
        `Sharpe ${formatRatio(m.sharpeRatio)} | WR ${formatPercent(m.winRate)} | ` +
        `PF ${formatRatio(m.profitFactor)} | ${m.totalTrades} trades`,
    );
  }

  const excluded = report.outcomes.filter((o) => o.status === 'insufficient_sample').length;
  const failed = report.outcomes.filter((o) => o.status === 'failed').length;
  if (excluded > 0 || failed > 0) {
    lines.push('');
    lines.push(`<i>${excluded} below trade minimum, ${failed} failed</i>`);
  }
  return lines.join('\n');
}

/**
 * Outbound-only notifier. Without a token and chat id every send is a no-op.
 */
export class TelegramNotifier {
  private bot: TelegramBot | null = null;
  private readonly chatId: string | null;

  constructor(options: TelegramOptions = {}) {
    const token = options.token ?? process.env.TELEGRAM_BOT_TOKEN;
    this.chatId = options.chatId ?? process.env.TELEGRAM_CHAT_ID ?? null;

    if (!token) {
      log.warn('TELEGRAM_BOT_TOKEN not set: Telegram notifications disabled');
      return;
    }
    if (!this.chatId) {
      log.warn('TELEGRAM_CHAT_ID not set: Telegram notifications disabled');
      return;
    }

    this.bot = new TelegramBot(token, { polling: false });
    log.info('Telegram bot initialized');
  }

  get enabled(): boolean {
    return this.bot !== null;
  }

  /**
   * Sends HTML text, split on line boundaries into messages under the
   * Telegram size limit. Returns the number of messages delivered.
   */
  async sendMessage(text: string): Promise<number> {
    if (!this.bot || !this.chatId) return 0;

    let sent = 0;
    for (const chunk of chunkText(text, CHUNK_LIMIT)) {
      try {
        await this.bot.sendMessage(this.chatId, chunk, { parse_mode: 'HTML' });
        sent++;
      } catch (err) {
        log.error({ err }, 'Failed to send Telegram message');
        break;
      }
    }
    return sent;
  }

  async sendAlerts(alerts: readonly SignalAlert[], title?: string): Promise<number> {
    return this.sendMessage(formatAlertMessage(alerts, title));
  }

  async sendRanking(report: RankingReport, top?: number): Promise<number> {
    return this.sendMessage(formatRankingMessage(report, top));
  }
}
