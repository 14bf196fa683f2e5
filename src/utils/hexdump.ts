const BYTES_PER_LINE = 16;

function hex2(n: number): string {
  return n.toString(16).padStart(2, "0");
}

// formatHexDump renders bytes as offset / hex / ASCII lines, 16 bytes per line.
//
//   0000  48 65 6c 6c 6f 00 01 02  03 04 05 06 07 08 09 0a  |Hello...........|
export function formatHexDump(data: Uint8Array): string {
  const lines: string[] = [];
  for (let off = 0; off < data.length; off += BYTES_PER_LINE) {
    const chunk = data.subarray(off, off + BYTES_PER_LINE);
    let line = `${off.toString(16).padStart(4, "0")}  `;
    for (let j = 0; j < BYTES_PER_LINE; j++) {
      if (j === 8) line += " ";
      line += j < chunk.length ? `${hex2(chunk[j]!)} ` : "   ";
    }
    line += " |";
    for (const b of chunk) line += b >= 0x20 && b <= 0x7e ? String.fromCharCode(b) : ".";
    line += "|";
    lines.push(line);
  }
  return lines.join("\n");
}
