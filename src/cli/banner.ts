import chalk from "chalk";

type BannerOptions = {
  columns?: number;
  richTty?: boolean;
};

const TAGLINE = "capture dates back where they belong";

const hasJsonFlag = (argv: string[]) =>
  argv.some((arg) => arg === "--json" || arg.startsWith("--json="));

const hasVersionFlag = (argv: string[]) =>
  argv.some((arg) => arg === "--version" || arg === "-V");

export function formatCliBannerLine(version: string, options: BannerOptions = {}): string {
  const rich = options.richTty ?? chalk.level > 0;
  const title = "restamp";
  const columns = options.columns ?? process.stdout.columns ?? 120;
  const plainFullLine = `${title} ${version} - ${TAGLINE}`;
  const fitsOnOneLine = plainFullLine.length <= columns;
  if (rich) {
    const head = `${chalk.bold.cyan(title)} ${chalk.blue(version)}`;
    return fitsOnOneLine ? `${head} ${chalk.dim(`- ${TAGLINE}`)}` : `${head}\n  ${chalk.dim(TAGLINE)}`;
  }
  return fitsOnOneLine ? plainFullLine : `${title} ${version}\n  ${TAGLINE}`;
}

/** Whether the banner belongs on this invocation's output. */
export function shouldEmitBanner(argv: string[], isTty: boolean): boolean {
  return isTty && !hasJsonFlag(argv) && !hasVersionFlag(argv);
}
