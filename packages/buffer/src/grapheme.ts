// 字形分割器（共享实例）
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * 获取共享的字形分割器实例。
 */
export function getSegmenter(): Intl.Segmenter {
	return segmenter;
}

/**
 * 将文本拆分为字形集群。
 */
export function splitGraphemes(text: string): string[] {
	const graphemes: string[] = [];
	for (const { segment } of segmenter.segment(text)) {
		graphemes.push(segment);
	}
	return graphemes;
}

/**
 * 字形集群数量（不是 UTF-16 长度，也不是码点数量）。
 */
export function graphemeCount(text: string): number {
	// Fast path: pure ASCII
	let isPureAscii = true;
	for (let i = 0; i < text.length; i++) {
		if (text.charCodeAt(i) > 0x7e) {
			isPureAscii = false;
			break;
		}
	}
	// \r\n 是一个字形
	if (isPureAscii && !text.includes("\r\n")) {
		return text.length;
	}

	let count = 0;
	for (const _ of segmenter.segment(text)) {
		count++;
	}
	return count;
}

/**
 * 每个字形的起始 UTF-16 偏移量，末尾附加 text.length 作为哨兵。
 * offsets[i] 是第 i 个字形的起点，offsets[count] === text.length。
 */
export function graphemeOffsets(text: string): number[] {
	const offsets: number[] = [];
	for (const { index } of segmenter.segment(text)) {
		offsets.push(index);
	}
	offsets.push(text.length);
	return offsets;
}

/**
 * 将 UTF-16 偏移量映射回字形索引。
 * 偏移量落在多码点集群内部时返回 undefined。
 */
export function graphemeIndexAt(offsets: readonly number[], offset: number): number | undefined {
	let lo = 0;
	let hi = offsets.length - 1;
	while (lo <= hi) {
		const mid = (lo + hi) >> 1;
		const value = offsets[mid];
		if (value === offset) return mid;
		if (value < offset) lo = mid + 1;
		else hi = mid - 1;
	}
	return undefined;
}
