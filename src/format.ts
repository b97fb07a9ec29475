const UNITS = ["kB", "MB", "GB", "TB", "PB", "EB"];

/**
 * Renders a byte count with decimal units, e.g. 1536000000 as "1.5 GB".
 */
export function formatSize(bytes: number): string {
  if (bytes === 1) {
    return "1 Byte";
  }
  if (bytes < 1000) {
    return `${bytes} Bytes`;
  }

  let value = bytes / 1000;
  let unit = 0;
  while (value >= 1000 && unit < UNITS.length - 1) {
    value /= 1000;
    unit++;
  }
  return `${value.toFixed(1)} ${UNITS[unit]}`;
}
