/**
 * zlib stream built from stored (uncompressed) deflate blocks
 */

const MAX_STORED_BLOCK = 65535

/**
 * Adler-32 checksum
 */
export function adler32(data: Uint8Array): number {
	const MOD = 65521
	let a = 1
	let b = 0

	for (const byte of data) {
		a = (a + byte) % MOD
		b = (b + a) % MOD
	}

	return ((b << 16) | a) >>> 0
}

/**
 * Wrap data in a zlib stream of stored blocks
 */
export function deflateStored(data: Uint8Array): Uint8Array {
	const blockCount = Math.max(1, Math.ceil(data.length / MAX_STORED_BLOCK))
	const output = new Uint8Array(2 + blockCount * 5 + data.length + 4)

	// CM=8 (deflate), CINFO=7; (0x78 * 256 + 0x01) % 31 === 0
	output[0] = 0x78
	output[1] = 0x01

	let pos = 2
	for (let block = 0; block < blockCount; block++) {
		const start = block * MAX_STORED_BLOCK
		const chunk = data.subarray(start, Math.min(start + MAX_STORED_BLOCK, data.length))
		const len = chunk.length
		const nlen = len ^ 0xffff

		// BFINAL on the last block, BTYPE=00
		output[pos] = block === blockCount - 1 ? 0x01 : 0x00
		output[pos + 1] = len & 0xff
		output[pos + 2] = (len >> 8) & 0xff
		output[pos + 3] = nlen & 0xff
		output[pos + 4] = (nlen >> 8) & 0xff
		output.set(chunk, pos + 5)
		pos += 5 + len
	}

	const checksum = adler32(data)
	output[pos] = (checksum >>> 24) & 0xff
	output[pos + 1] = (checksum >>> 16) & 0xff
	output[pos + 2] = (checksum >>> 8) & 0xff
	output[pos + 3] = checksum & 0xff

	return output
}
