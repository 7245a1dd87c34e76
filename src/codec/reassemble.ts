import { LogicalSms, SmsFragment } from './types';

function toLogical(head: SmsFragment, members: SmsFragment[]): LogicalSms {
	return {
		index: head.index,
		status: head.status,
		number: head.sender,
		time: head.timestamp,
		message: members.map((member) => member.text).join(''),
		indexes: members.map((member) => member.index).sort((a, b) => a - b)
	};
}

/**
 * Joins the fragments of concatenated messages.
 *
 * Fragments sharing sender and reference are merged only when every part `1..total` is present;
 * the result is reported under the index of the first part. Single-part messages, incomplete
 * groups and groups holding a sequence twice pass through unmerged. The output is ordered by index.
 */
export function reassemble(fragments: SmsFragment[]) {
	const result: LogicalSms[] = [];
	const groups = new Map<string, SmsFragment[]>();

	for (const fragment of fragments) {
		if (fragment.total <= 1) {
			result.push(toLogical(fragment, [fragment]));
			continue;
		}

		const key = `${fragment.sender}_${fragment.reference}`;
		const group = groups.get(key);

		if (group === undefined) {
			groups.set(key, [fragment]);
		} else {
			group.push(fragment);
		}
	}

	for (const members of groups.values()) {
		const total = members[0].total;
		const bySequence = new Map<number, SmsFragment>();
		let ambiguous = false;

		for (const member of members) {
			if (member.total !== total || bySequence.has(member.sequence)) {
				ambiguous = true;
				break;
			}

			bySequence.set(member.sequence, member);
		}

		const ordered: SmsFragment[] = [];

		for (let sequence = 1; sequence <= total && !ambiguous; sequence++) {
			const part = bySequence.get(sequence);

			if (part === undefined) {
				break;
			}

			ordered.push(part);
		}

		// incomplete, or two messages sharing a reference
		if (ambiguous || ordered.length !== total) {
			for (const member of members) {
				result.push(toLogical(member, [member]));
			}

			continue;
		}

		result.push(toLogical(ordered[0], ordered));
	}

	return result.sort((a, b) => a.index - b.index);
}
