/**
 * Upload progress as a percentage rewritten in place.
 */
export function createProgressReporter(
  write: (text: string) => void
): (bytesSent: number, total: number) => void {
  let last = -1;
  return (bytesSent, total) => {
    const percent = total > 0 ? Math.floor((bytesSent * 100) / total) : 100;
    if (percent === last) {
      return;
    }
    last = percent;
    write(`\rUploading: ${percent}%`);
    if (percent === 100) {
      write('\n');
    }
  };
}
