/**
 * Report Formatter
 *
 * Plain-text summary lines for the console.
 */

import type { OpenTrade, Trade } from '../simulation/types.js';
import type { PerformanceReport } from './types.js';

/**
 * Format a performance report as aligned label/value lines
 */
export function formatReport(report: PerformanceReport): string {
  const rows: [string, string][] = [
    ['Total Return', formatPercent(report.totalReturnPct)],
    ['Sharpe Ratio', report.sharpeRatio.toFixed(3)],
    ['Max Drawdown', formatPercent(report.maxDrawdownPct)],
    ['Volatility', formatPercent(report.volatilityPct)],
    ['Win Rate', formatPercent(report.winRatePct)],
    ['Win/Loss Ratio', formatRatio(report.winLossRatio)],
    ['Total Trades', String(report.totalTrades)],
    ['Avg Trade P&L', formatCurrency(report.avgTradePnl)],
    ['Final Value', formatCurrency(report.finalPortfolioValue)],
  ];

  const width = Math.max(...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `${label.padEnd(width)} : ${value}`).join('\n');
}

/**
 * One line per closed trade
 */
export function formatTrade(trade: Trade): string {
  const sign = trade.realizedPnl >= 0 ? '+' : '-';
  return (
    `${formatDate(trade.entryTimestamp)} BUY ${trade.shares} @ ${formatCurrency(trade.entryPrice)}` +
    ` -> ${formatDate(trade.exitTimestamp)} SELL @ ${formatCurrency(trade.exitPrice)}` +
    ` | P&L ${sign}${formatCurrency(Math.abs(trade.realizedPnl))}`
  );
}

export function formatOpenTrade(trade: OpenTrade): string {
  return `${formatDate(trade.entryTimestamp)} BUY ${trade.shares} @ ${formatCurrency(trade.entryPrice)} (open)`;
}

/**
 * Currency with thousands separators and 2 decimals
 */
function formatCurrency(value: number): string {
  return '$' + value.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
}

function formatPercent(value: number): string {
  return value.toFixed(2) + '%';
}

function formatRatio(value: number): string {
  return Number.isFinite(value) ? value.toFixed(3) : '∞';
}

function formatDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}
