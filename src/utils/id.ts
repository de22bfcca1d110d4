export interface SessionIdParts {
  yyyyMMdd: string; // YYYYMMDD
  nnn: string; // 3 digits
}

function formatSessionId(parts: SessionIdParts): string {
  return `s-${parts.yyyyMMdd}-${parts.nnn}`;
}

export function parseSessionId(sessionId: string): SessionIdParts | null {
  const m = /^s-(\d{8})-(\d{3})$/.exec(sessionId);
  if (!m) return null;
  const [, yyyyMMdd, nnn] = m;
  if (yyyyMMdd === undefined || nnn === undefined) return null;
  return { yyyyMMdd, nnn };
}

export class SessionIdGenerator {
  private currentDate: string | null = null;
  private seq = 0;

  next(now: Date = new Date()): string {
    const yyyyMMdd = formatDate(now);
    if (this.currentDate !== yyyyMMdd) {
      this.currentDate = yyyyMMdd;
      this.seq = 0;
    }
    this.seq += 1;
    return formatSessionId({ yyyyMMdd, nnn: String(this.seq).padStart(3, '0') });
  }
}

function formatDate(d: Date): string {
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  return `${yyyy}${mm}${dd}`;
}
