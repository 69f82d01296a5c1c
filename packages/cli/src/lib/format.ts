import chalk from "chalk";
import type { SessionActivity, SessionDetail, SessionSnapshot } from "@jules-monitor/core";

export function header(title: string): string {
  const line = "─".repeat(76);
  return [
    chalk.dim(`┌${line}┐`),
    chalk.dim("│") + chalk.bold(` ${title}`.padEnd(76)) + chalk.dim("│"),
    chalk.dim(`└${line}┘`),
  ].join("\n");
}

export function statusColor(status: string): string {
  switch (status) {
    case "IN_PROGRESS":
    case "PLANNING":
      return chalk.green(status);
    case "QUEUED":
    case "PAUSED":
      return chalk.yellow(status);
    case "COMPLETED":
      return chalk.blue(status);
    case "FAILED":
      return chalk.red(status);
    case "AWAITING_USER_FEEDBACK":
    case "AWAITING_PLAN_APPROVAL":
      return chalk.magenta(status);
    case "UNKNOWN":
      return chalk.gray(status);
    default:
      return status;
  }
}

// eslint-disable-next-line no-control-regex
const ANSI_RE = /\u001b\[[0-9;]*m/g;

/** Pad/truncate a string to exactly `width` visible characters */
export function padCol(str: string, width: number): string {
  const visible = str.replace(ANSI_RE, "");
  if (visible.length > width) {
    return (visible.slice(0, width - 1) + "…").padEnd(width);
  }
  return str + " ".repeat(Math.max(0, width - visible.length));
}

export function formatSessionRow(session: SessionSnapshot): string {
  return [
    padCol(chalk.green(session.id || "-"), 22),
    padCol(statusColor(session.status), 26),
    session.title,
  ].join("  ");
}

export function formatSessionDetail(session: SessionDetail): string[] {
  return [
    `  ID:     ${chalk.green(session.id)}`,
    `  Title:  ${session.title}`,
    `  State:  ${statusColor(session.status)}`,
    `  URL:    ${chalk.dim(session.url)}`,
  ];
}

export function formatActivityLine(activity: SessionActivity): string {
  return `  ${chalk.cyan(activity.type)} ${chalk.dim(activity.createTime || "-")}`;
}
