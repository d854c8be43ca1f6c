import type { DelimitedRow, JsonValue, StreamEvent } from '../types.js'

export function decodeJson(text: string): JsonValue {
	const value: JsonValue = JSON.parse(text)
	return value
}

/**
 * Splits one line into cells. A delimiter inside double quotes belongs to the
 * cell, and `""` inside quotes is a literal quote. Unquoted cells are trimmed.
 */
function splitLine(line: string, delimiter: string): string[] {
	const cells: string[] = []
	let cell = ''
	let quoted = false
	let inQuotes = false

	for (let i = 0; i < line.length; i++) {
		const ch = line[i]
		if (inQuotes) {
			if (ch !== '"') {
				cell += ch
			} else if (line[i + 1] === '"') {
				cell += '"'
				i++
			} else {
				inQuotes = false
			}
			continue
		}
		if (ch === '"' && cell.trim() === '') {
			inQuotes = true
			quoted = true
			cell = ''
		} else if (line.startsWith(delimiter, i)) {
			cells.push(quoted ? cell : cell.trim())
			cell = ''
			quoted = false
			i += delimiter.length - 1
		} else if (!quoted || ch.trim() !== '') {
			cell += ch
		}
	}
	cells.push(quoted ? cell : cell.trim())
	return cells
}

/**
 * Splits a delimited-text body into rows keyed by its header line. Blank
 * lines are skipped; missing trailing cells become empty strings.
 */
export function decodeDelimited(text: string, delimiter = ','): DelimitedRow[] {
	const lines = text
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0)

	if (lines.length === 0) return []

	const head = lines[0]
	// JSON or HTML error bodies served under a delimited-text request
	if (head.startsWith('{') || head.startsWith('[') || head.startsWith('<')) {
		throw new SyntaxError('Response is not delimited text')
	}

	const headers = splitLine(head, delimiter)

	return lines.slice(1).map((line) => {
		const cells = splitLine(line, delimiter)
		const row: DelimitedRow = {}
		for (let i = 0; i < headers.length; i++) {
			row[headers[i]] = cells[i] ?? ''
		}
		return row
	})
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function decodeStreamEvent(raw: string): StreamEvent {
	const parsed: unknown = JSON.parse(raw)
	if (!isRecord(parsed)) {
		throw new SyntaxError(`Expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`)
	}
	return parsed
}
