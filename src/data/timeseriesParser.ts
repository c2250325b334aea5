/**
 * Time Series CSV Parser
 *
 * Parses delimited text exports of stock time series (one row per stock
 * and year, a header line with column names) into a DataTable.
 *
 * The parser handles:
 * - Double-quoted fields, with "" as an escaped quote
 * - CRLF line endings and blank lines
 * - Missing values written as empty fields or NA
 * - Numeric conversion of number-like fields, except in the first
 *   (stock id) column, which is kept as text
 */

import { InvalidTableError } from '../errors';
import type { CellValue, DataTable } from './types';

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Split one line into raw fields
 *
 * Quoted fields may contain the delimiter; they may not span lines.
 */
function splitLine(line: string, delimiter: string): string[] {
    const fields: string[] = [];
    let current = '';
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
        const char = line[i];

        if (inQuotes) {
            if (char === '"' && line[i + 1] === '"') {
                current += '"';
                i++;
            } else if (char === '"') {
                inQuotes = false;
            } else {
                current += char;
            }
        } else if (char === '"') {
            inQuotes = true;
        } else if (char === delimiter) {
            fields.push(current);
            current = '';
        } else {
            current += char;
        }
    }

    if (inQuotes) {
        throw new Error('unterminated quoted field');
    }
    fields.push(current);
    return fields;
}

// Stock ids such as "007" or "1e3" must survive unchanged
function toIdCell(field: string): CellValue {
    const text = field.trim();
    return text === '' ? null : text;
}

function toCell(field: string): CellValue {
    const text = field.trim();
    if (text === '' || text === 'NA') {
        return null;
    }
    return NUMBER_PATTERN.test(text) ? Number(text) : text;
}

/**
 * Parse a delimited time series export
 *
 * @param text - Raw file content, header line first
 * @param delimiter - Field separator (default: ',')
 * @returns Table with one row per non-blank data line
 * @throws InvalidTableError if the file is empty or a line has the wrong
 *         number of fields
 */
export function parseTimeSeriesCsv(text: string, delimiter: string = ','): DataTable {
    try {
        const lines = text
            .split(/\r?\n/)
            .map((line, index) => ({ line, lineNumber: index + 1 }))
            .filter(({ line }) => line.trim() !== '');

        if (lines.length === 0) {
            throw new Error('missing header line');
        }

        const columns = splitLine(lines[0].line, delimiter).map(name => name.trim());

        const rows = lines.slice(1).map(({ line, lineNumber }) => {
            let fields: string[];
            try {
                fields = splitLine(line, delimiter);
            } catch (error: unknown) {
                const reason = error instanceof Error ? error.message : String(error);
                throw new Error(`line ${lineNumber}: ${reason}`);
            }
            if (fields.length !== columns.length) {
                throw new Error(
                    `line ${lineNumber}: expected ${columns.length} fields, got ${fields.length}`
                );
            }
            return fields.map((field, index) => (index === 0 ? toIdCell(field) : toCell(field)));
        });

        return { columns, rows };

    } catch (error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error('Error parsing time series file:', reason);
        throw new InvalidTableError(`Failed to parse time series file: ${reason}`);
    }
}
