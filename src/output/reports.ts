import { INDUSTRY_CATEGORIES, OutputMessage, PartnerEntry } from '../types';
import { INDUSTRY_LABELS } from './OutputComposer';

const RULE = '='.repeat(60);

export interface ReportFile {
  fileName: string;
  content: string;
}

export function highPriorityReport(messages: readonly OutputMessage[], dateKey: string): string {
  const direct = messages.filter((m) => m.relevance === 'direct');
  const lines = [`HIGH PRIORITY (${dateKey}): ${direct.length} articles`, ''];
  direct.forEach((message, i) => {
    lines.push(RULE, `MESSAGE ${i + 1}/${direct.length}`, RULE, message.text, '');
  });
  return lines.join('\n');
}

/** Indirect items grouped by industry category, in category order. */
export function referenceReport(messages: readonly OutputMessage[], dateKey: string): string {
  const indirect = messages.filter((m) => m.relevance === 'indirect');
  const lines = [`REFERENCE (${dateKey}): ${indirect.length} articles`];
  for (const category of INDUSTRY_CATEGORIES) {
    const group = indirect.filter((m) => m.category === category);
    if (!group.length) continue;
    lines.push('', `${INDUSTRY_LABELS[category]} (${group.length})`);
    for (const message of group) {
      lines.push(`• ${message.title}`, `  🔗 ${message.articleUrl}`);
    }
  }
  return lines.join('\n') + '\n';
}

const escapeCell = (text: string) => text.replace(/\|/g, '\\|').replace(/\n/g, ' ');

/** Markdown table per primary field (the text before the first comma). */
export function partnerMarkdown(entries: readonly PartnerEntry[], dateKey: string): string {
  const byField = new Map<string, PartnerEntry[]>();
  for (const entry of entries) {
    const field = entry.field.split(',')[0].trim() || 'Other';
    const list = byField.get(field) ?? [];
    list.push(entry);
    byField.set(field, list);
  }

  const fields = [...byField.entries()].sort((a, b) => b[1].length - a[1].length || a[0].localeCompare(b[0]));
  const lines = [`# Partner index (${dateKey})`, '', `${entries.length} organizations across ${fields.length} fields.`];
  for (const [field, group] of fields) {
    lines.push('', `## ${field} (${group.length})`, '', '| Name | Recent achievement | Collaboration point | Article |', '|---|---|---|---|');
    for (const entry of group) {
      const achievement =
        entry.recentAchievement.length > 100 ? entry.recentAchievement.slice(0, 100) + '...' : entry.recentAchievement;
      lines.push(
        `| ${escapeCell(entry.name)} | ${escapeCell(achievement)} | ${escapeCell(entry.collaborationPoint)} | [link](${entry.articleUrl}) |`
      );
    }
  }
  return lines.join('\n') + '\n';
}

export function buildReports(
  dateKey: string,
  messages: readonly OutputMessage[],
  partners: readonly PartnerEntry[]
): ReportFile[] {
  return [
    { fileName: `${dateKey}_HIGH_PRIORITY.txt`, content: highPriorityReport(messages, dateKey) },
    { fileName: `${dateKey}_REFERENCE.txt`, content: referenceReport(messages, dateKey) },
    { fileName: `${dateKey}_partners.md`, content: partnerMarkdown(partners, dateKey) },
  ];
}
