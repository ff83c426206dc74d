/** CRC-32 (IEEE 802.3, reflected polynomial 0xEDB88320) lookup table, one entry per byte value. */
const TABLE: Uint32Array = (() => {
	const table = new Uint32Array(256);
	for (let n = 0; n < 256; n++) {
		let c = n;
		for (let k = 0; k < 8; k++) {
			c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
		}
		table[n] = c;
	}
	return table;
})();

/**
 * Compute the CRC-32 checksum used by ZIP local and central headers.
 *
 * Pass the result of a previous call as `previous` to checksum data in chunks.
 */
export function crc32(buf: Uint8Array, previous = 0): number {
	let crc = ~previous;
	for (let i = 0; i < buf.length; i++) {
		crc = TABLE[(crc ^ buf[i]) & 0xff] ^ (crc >>> 8);
	}
	return ~crc >>> 0;
}
