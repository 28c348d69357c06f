/** Decodes at most `maxBytes` of UTF-8, cutting before a partial character. */
export function utf8Prefix(bytes: Buffer, maxBytes: number): string {
	if (bytes.length <= maxBytes) return bytes.toString('utf-8');
	let end = maxBytes;
	while (end > 0 && ((bytes[end] ?? 0) & 0xc0) === 0x80) {
		end--;
	}
	return bytes.subarray(0, end).toString('utf-8');
}

/** Truncates to a byte budget and marks the cut. */
export function truncateBytes(value: string, maxBytes: number): string {
	const bytes = Buffer.from(value, 'utf-8');
	if (bytes.length <= maxBytes) return value;
	return `${utf8Prefix(bytes, maxBytes)}... [truncated]`;
}
