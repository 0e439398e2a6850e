export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}

const COMMAND_ERROR_PATTERNS: { pattern: RegExp; message: (bin?: string) => string }[] = [
  {
    pattern: /Permission denied|you must be root/i,
    message: () => "Permission denied. Run portguard with sudo.",
  },
  {
    pattern: /xtables lock|Another app is currently holding the xtables lock/i,
    message: () => "Another process holds the xtables lock. Wait a moment and retry.",
  },
  {
    pattern: /Bad rule|does a matching rule exist/i,
    message: () => "The rule is not in the chain (already removed or never applied).",
  },
  {
    pattern: /Table does not exist|can't initialize|Couldn't load match|Couldn't load target/i,
    message: (bin) =>
      `Kernel support for ${bin || "iptables"} is missing. Check that the netfilter modules are loaded.`,
  },
  {
    pattern: /ENOENT|command not found|not found/i,
    message: (bin) => `${bin || "Required command"} not found. Install with: sudo apt install iptables iptables-persistent`,
  },
  {
    pattern: /timed out/i,
    message: () => "The command timed out. The system may be under heavy load; retry shortly.",
  },
];

export function mapCommandError(error: unknown, bin?: string): string {
  const message = getErrorMessage(error);
  for (const { pattern, message: getMessage } of COMMAND_ERROR_PATTERNS) {
    if (pattern.test(message)) {
      return getMessage(bin);
    }
  }
  return "";
}

export function sanitizeStderr(stderr: string, maxLength: number = 200): string {
  if (!stderr) return "";
  let sanitized = stderr.replace(/\s+/g, " ").trim();
  if (sanitized.length > maxLength) {
    sanitized = sanitized.substring(0, maxLength) + "...";
  }
  return sanitized;
}

const FS_ERROR_CODES: Record<string, string> = {
  ENOENT: "File or directory not found. Check the path and try again.",
  EACCES: "Permission denied. Check file permissions or run with elevated privileges.",
  EPERM: "Permission denied. Check file permissions or run with elevated privileges.",
  ENOSPC: "Disk full. Free up space and try again.",
  EROFS: "File system is read-only. Choose another backup directory.",
};

export function mapFileSystemError(error: unknown): string {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    if (error.code in FS_ERROR_CODES) {
      return FS_ERROR_CODES[error.code];
    }
  }
  return "";
}
