/**
 * Aligned column output for tab-separated lines.
 *
 * Each cell that is followed by a tab is padded with spaces to the widest
 * cell of its column plus `padding`, widths counted in code points. The last
 * cell of a line is written as is, so lines carry no trailing padding.
 */
export class TableWriter {
	private readonly rows: string[][] = [];

	constructor(readonly padding: number = 5) {}

	/** Buffer one tab-separated line. */
	writeLine(line: string): this {
		this.rows.push(line.split("\t"));
		return this;
	}

	/** Buffer one row given as cells. */
	row(...cells: readonly (string | number)[]): this {
		this.rows.push(cells.map(String));
		return this;
	}

	/** Render every buffered line and clear the buffer. */
	flush(): string {
		const widths: number[] = [];
		for (const cells of this.rows) {
			cells.slice(0, -1).forEach((cell, col) => {
				widths[col] = Math.max(widths[col] ?? 0, runeLength(cell));
			});
		}

		let out = "";
		for (const cells of this.rows) {
			const last = cells.length - 1;
			out += cells
				.map((cell, col) => (col === last ? cell : this.pad(cell, widths[col] ?? 0)))
				.join("");
			out += "\n";
		}
		this.rows.length = 0;
		return out;
	}

	private pad(cell: string, width: number): string {
		return cell + " ".repeat(width - runeLength(cell) + this.padding);
	}
}

/** Width in code points, so astral-plane characters count once. */
function runeLength(s: string): number {
	return [...s].length;
}
