import { diagnoseDoctor, type DiagnoseOptions, type DoctorIssue } from "./index.js";

const COLORS = {
  RED: "\x1b[0;31m",
  GREEN: "\x1b[0;32m",
  YELLOW: "\x1b[1;33m",
  BLUE: "\x1b[0;34m",
  CYAN: "\x1b[0;36m",
  NC: "\x1b[0m",
};

function uiInfo(msg: string): void { console.log(`${COLORS.BLUE}i${COLORS.NC} ${msg}`); }
function uiSuccess(msg: string): void { console.log(`${COLORS.GREEN}✓${COLORS.NC} ${msg}`); }
function uiWarn(msg: string): void { console.log(`${COLORS.YELLOW}!${COLORS.NC} ${msg}`); }
function uiError(msg: string): void { console.log(`${COLORS.RED}x${COLORS.NC} ${msg}`); }
function uiHeader(title: string): void {
  console.log("");
  console.log(`${COLORS.CYAN}━━━ ${title} ━━━${COLORS.NC}`);
  console.log("");
}

export interface DoctorIO {
  print: (msg: string) => void;
  header?: (title: string) => void;
  info?: (msg: string) => void;
  warn?: (msg: string) => void;
  error?: (msg: string) => void;
  success?: (msg: string) => void;
}

export function createDefaultDoctorIO(): DoctorIO {
  return {
    print: (msg) => console.log(msg),
    header: uiHeader,
    info: uiInfo,
    warn: uiWarn,
    error: uiError,
    success: uiSuccess,
  };
}

function printIssue(io: DoctorIO, issue: DoctorIssue): void {
  const src = issue.source ? ` (${issue.source})` : "";
  const line = `${issue.id}${src}: ${issue.message}`;
  const emit = issue.severity === "error" ? io.error : io.warn;
  if (emit) emit(line);
  else io.print(`${issue.severity.toUpperCase()} ${line}`);
}

/** Print a diagnosis; returns the process exit code. */
export async function runDoctorCli(opts: DiagnoseOptions & { io: DoctorIO }): Promise<number> {
  const { io } = opts;
  io.header?.("filewise doctor");

  const report = await diagnoseDoctor(opts);
  io.info?.(`Config: ${report.configPath}`);
  if (report.models) io.info?.(`Models available: ${report.models.join(", ") || "(none)"}`);

  for (const issue of report.issues) printIssue(io, issue);

  if (report.ok) {
    io.success?.(report.issues.length === 0 ? "All checks passed." : "No blocking problems found.");
    return 0;
  }
  io.print("");
  io.print("Fix the errors above and run `filewise doctor` again.");
  return 1;
}
