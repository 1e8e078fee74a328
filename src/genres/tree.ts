/**
 * A node of the genre tree. Top-level genres have depth 0.
 */
export class Genre {
	constructor(
		readonly name: string,
		readonly parent: Genre | undefined,
		readonly isLeaf: boolean,
		readonly depth: number
	) {}

	/** Ancestors, closest first. */
	parents(): Genre[] {
		const parents: Genre[] = [];
		for (let current = this.parent; current !== undefined; current = current.parent) {
			parents.push(current);
		}
		return parents;
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Flatten the nested list/mapping structure of a genre tree (as found in
 * beets' genres-tree.yaml) into a list of nodes, parents before children.
 */
export function flattenGenreTree(raw: unknown, parent?: Genre, depth = 0, output: Genre[] = []): Genre[] {
	if (Array.isArray(raw)) {
		for (const element of raw) {
			if (typeof element === "string") {
				output.push(new Genre(element, parent, true, depth));
			} else {
				flattenGenreTree(element, parent, depth, output);
			}
		}
	} else if (isRecord(raw)) {
		for (const [name, subtree] of Object.entries(raw)) {
			const genre = new Genre(name, parent, false, depth);
			output.push(genre);
			flattenGenreTree(subtree, genre, depth + 1, output);
		}
	}
	return output;
}
