import { writeFileSync } from 'node:fs';
import { ARTICLE_COLUMNS, type ArticleColumn, type ArticleRow, type ExportFormat } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Main Export Function ────────────────────────────────

/**
 * Write rows to `outputPath` in the given format, overwriting any existing file.
 */
export function exportRows(rows: ArticleRow[], outputPath: string, format: ExportFormat): void {
    let content: string;
    switch (format) {
        case 'csv':
            content = toCsv(rows);
            break;
        case 'json':
            content = toJson(rows);
            break;
        default:
            throw new Error(`Unsupported export format: ${String(format)}`);
    }

    writeFileSync(outputPath, content, 'utf-8');
    getLogger().debug({ format, outputPath, rows: rows.length }, 'Rows exported');
}

// ─── Format Implementations ─────────────────────────────

/**
 * Columns in table order; `citations` is appended only when some row carries it.
 */
export function columnsFor(rows: ArticleRow[]): ArticleColumn[] {
    const columns: ArticleColumn[] = [...ARTICLE_COLUMNS];
    if (rows.some((row) => row.citations !== undefined)) {
        columns.push('citations');
    }
    return columns;
}

/**
 * CSV with a header row and no index column.
 * Lists are written as JSON arrays, null as an empty field.
 */
export function toCsv(rows: ArticleRow[]): string {
    const columns = columnsFor(rows);
    let csv = columns.join(',') + '\n';

    for (const row of rows) {
        csv += columns.map((column) => csvField(row[column])).join(',') + '\n';
    }

    return csv;
}

export function toJson(rows: ArticleRow[]): string {
    return JSON.stringify(rows, null, 2);
}

function csvField(value: string | number | string[] | null | undefined): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'number') return String(value);

    const text = Array.isArray(value) ? JSON.stringify(value) : value;
    if (/[",\r\n]/.test(text)) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
}
