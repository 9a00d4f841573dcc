type BannerOptions = {
  argv?: string[];
  columns?: number;
  isTty?: boolean;
};

const TITLE = "tidyfs";
const TAGLINE = "rule-based file organizer with dry-run and undo";

let bannerEmitted = false;

const hasVersionFlag = (argv: string[]) =>
  argv.some((arg) => arg === "--version" || arg === "-V" || arg === "-v");

export function formatCliBannerLine(version: string, options: BannerOptions = {}): string {
  const columns = options.columns ?? process.stdout.columns ?? 120;
  const fullLine = `${TITLE} ${version} - ${TAGLINE}`;
  if (fullLine.length <= columns) {
    return fullLine;
  }
  return `${TITLE} ${version}\n  ${TAGLINE}`;
}

/** Print the banner once per process, and only to an interactive terminal. */
export function emitCliBanner(version: string, options: BannerOptions = {}): void {
  if (bannerEmitted) {
    return;
  }
  const argv = options.argv ?? process.argv;
  if (!(options.isTty ?? process.stdout.isTTY)) {
    return;
  }
  if (hasVersionFlag(argv)) {
    return;
  }
  process.stdout.write(`\n${formatCliBannerLine(version, options)}\n\n`);
  bannerEmitted = true;
}
