/**
 * Provenance annotations link a downstream commit to the upstream commit it
 * came from:
 *
 *   (cherry picked from commit <org>/<repo>@<id>)
 */

export function formatProvenance(org: string, repo: string, id: string): string {
	return `(cherry picked from commit ${org}/${repo}@${id})`;
}

function escapeRegExp(s: string): string {
	return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** All upstream ids a commit message references for `org/repo`, in message order. */
export function extractProvenance(message: string, org: string, repo: string): string[] {
	const re = new RegExp(
		`\\(cherry picked from commit ${escapeRegExp(org)}/${escapeRegExp(repo)}@([^)\\s]+)\\)`,
	);
	const ids: string[] = [];
	for (const line of message.split("\n")) {
		const match = line.match(re);
		if (match?.[1]) ids.push(match[1]);
	}
	return ids;
}
