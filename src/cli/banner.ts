import chalk from 'chalk';

export interface BannerData {
  version: string;
  address: string;
  httpUrl: string;
  servers: number;
  simulation: boolean;
  staticDir?: string;
}

const DIM = chalk.dim;
const URL = chalk.cyan;
const LABEL = chalk.gray;
const BOLD = chalk.bold;

function pad(label: string, width = 12): string {
  return label.padEnd(width);
}

// stderr keeps stdout free for piping
const out = (s: string) => process.stderr.write(s + '\n');

export function renderBanner(data: BannerData): void {
  out('');
  out(`  ${chalk.hex('#8b5cf6')(BOLD('presence-relay'))} ${DIM('v' + data.version)}`);
  out('');
  out(`  ${LABEL(pad('WebSocket'))}${URL(data.address)}`);
  out(`  ${LABEL(pad('HTTP'))}${URL(data.httpUrl)}`);
  if (data.staticDir) out(`  ${LABEL(pad('Static'))}${data.staticDir}`);
  out(`  ${LABEL(pad('Servers'))}${data.servers}`);
  out(`  ${LABEL(pad('Simulation'))}${data.simulation ? chalk.green('on') : DIM('off')}`);
  out('');
  out(`  ${chalk.green(BOLD('Ready'))} ${DIM('(Ctrl+C to stop)')}`);
  out('');
}
