import type { HarnessReport } from './harness.js';

function pad(value: string, width: number): string {
	return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

export function formatReport(report: HarnessReport): string {
	const header = ['RESULT', 'KIND', 'CASE', 'MS', 'DETAIL'];
	const body = report.rows.map((row) => [
		row.passed ? 'PASS' : 'FAIL',
		row.kind,
		row.name,
		String(row.durationMs),
		row.detail.replace(/\s+/g, ' '),
	]);
	const widths = header.map((cell, column) =>
		Math.max(cell.length, ...body.map((cells) => (column < 4 ? (cells[column] ?? '').length : 0))),
	);

	const line = (cells: string[]) =>
		cells
			.map((cell, column) => (column === cells.length - 1 ? cell : pad(cell, widths[column] ?? 0)))
			.join('  ');

	const failed = report.rows.filter((row) => !row.passed).length;
	return [
		line(header),
		...body.map(line),
		'',
		`${report.rows.length - failed}/${report.rows.length} passed${failed > 0 ? `, ${failed} failed` : ''}`,
	].join('\n');
}
