export type Alignment = "left" | "right";

/**
 * Build a markdown table from headers and rows.
 *
 * Columns are padded to the widest cell; right-aligned columns get a
 * `---:` separator so renderers keep numbers lined up.
 *
 * @example
 * buildMarkdownTable(["Parameter", "ns"], [["tAA", "13.75"]], ["left", "right"]);
 * // | Parameter |    ns |
 * // | --------- | ----: |
 * // | tAA       | 13.75 |
 */
export function buildMarkdownTable(
	headers: string[],
	rows: string[][],
	align: Alignment[] = [],
): string {
	const widths = headers.map((h) => Math.max(h.length, 3));
	for (const row of rows) {
		for (let i = 0; i < row.length; i++) {
			const cell = row[i] ?? "";
			if (cell.length > (widths[i] ?? 0)) {
				widths[i] = cell.length;
			}
		}
	}

	const pad = (s: string, i: number) => {
		const width = widths[i] ?? s.length;
		return align[i] === "right" ? s.padStart(width) : s.padEnd(width);
	};
	const line = (cells: string[]) => `| ${cells.map(pad).join(" | ")} |`;
	const separator = `| ${widths
		.map((w, i) => (align[i] === "right" ? `${"-".repeat(w - 1)}:` : "-".repeat(w)))
		.join(" | ")} |`;

	return [line(headers), separator, ...rows.map(line)].join("\n");
}
