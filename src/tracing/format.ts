/**
 * Export helpers shared by trace storages
 */

import { TraceEvent, TraceExportFormat, TraceSpan } from './types';

export function exportTraces(
  format: TraceExportFormat,
  events: TraceEvent[],
  spans: TraceSpan[]
): string {
  switch (format) {
    case 'json':
      return JSON.stringify({ events, spans }, null, 2);

    case 'csv': {
      const headers = ['timestamp', 'level', 'category', 'component', 'operation', 'data'];
      const rows = events.map(e => [
        new Date(e.timestamp).toISOString(),
        e.level,
        e.category,
        e.component,
        e.operation,
        csvCell(JSON.stringify(e.data))
      ]);
      return [headers, ...rows].map(row => row.join(',')).join('\n');
    }

    case 'markdown': {
      const lines: string[] = ['# Trace Export', ''];
      const byComponent = new Map<string, TraceEvent[]>();
      for (const event of events) {
        const list = byComponent.get(event.component) ?? [];
        list.push(event);
        byComponent.set(event.component, list);
      }
      for (const [component, list] of byComponent) {
        lines.push(`## ${component}`, '');
        for (const event of list) {
          const time = new Date(event.timestamp).toISOString();
          lines.push(`- **${time}** [${event.level}] ${event.operation}`);
          const message = event.data.message;
          if (typeof message === 'string') {
            lines.push(`  - ${message}`);
          }
        }
        lines.push('');
      }
      return lines.join('\n');
    }
  }
}

function csvCell(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
