export type Labels = Readonly<Record<string, string>>;

type Family = { name: string; help?: string; series: Map<string, number> };

const escape = (v: string) => v.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');

/** `{a="1",b="2"}` with keys sorted, or '' without labels. */
function selector(labels?: Labels): string {
  const keys = Object.keys(labels ?? {}).sort();
  if (!labels || !keys.length) return '';
  return `{${keys.map(k => `${k}="${escape(labels[k] ?? '')}"`).join(',')}}`;
}

/**
 * Counters and gauges rendered in the Prometheus text format. Each store
 * reports under its own `store` label.
 */
export class Metrics {
  private readonly counters = new Map<string, Family>();
  private readonly gauges = new Map<string, Family>();

  inc(name: string, by = 1, help?: string, labels?: Labels): void {
    const series = this.family(this.counters, name, help).series;
    const sel = selector(labels);
    series.set(sel, (series.get(sel) ?? 0) + by);
  }

  set(name: string, value: number, help?: string, labels?: Labels): void {
    this.family(this.gauges, name, help).series.set(selector(labels), value);
  }

  /** One series' value, or the sum over every series of `name` when no labels are given. 0 when never touched. */
  value(name: string, labels?: Labels): number {
    const family = this.counters.get(name) ?? this.gauges.get(name);
    if (!family) return 0;
    if (labels) return family.series.get(selector(labels)) ?? 0;
    let total = 0;
    for (const v of family.series.values()) total += v;
    return total;
  }

  render(): string {
    const lines: string[] = [];
    const emit = (families: Map<string, Family>, type: 'counter' | 'gauge') => {
      for (const f of families.values()) {
        if (f.help) lines.push(`# HELP ${f.name} ${f.help}`);
        lines.push(`# TYPE ${f.name} ${type}`);
        for (const [sel, v] of f.series) lines.push(`${f.name}${sel} ${v}`);
      }
    };
    emit(this.counters, 'counter');
    emit(this.gauges, 'gauge');
    return lines.join('\n') + '\n';
  }

  private family(families: Map<string, Family>, name: string, help?: string): Family {
    let f = families.get(name);
    if (!f) {
      f = { name, help, series: new Map() };
      families.set(name, f);
    }
    f.help ??= help;
    return f;
  }
}

export const metrics = new Metrics();
