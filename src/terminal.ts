/** Operator-facing progress output. Structured diagnostics go through logger.ts instead. */
export class Terminal {
  constructor(private readonly sink: (line: string) => void = (line) => process.stdout.write(`${line}\n`)) {}

  step(message: string): void {
    this.sink(`🔧 ${message}`);
  }

  success(message: string): void {
    this.sink(`✅ ${message}`);
  }

  info(message: string): void {
    this.sink(`ℹ️ ${message}`);
  }

  warn(message: string): void {
    this.sink(`⚠️ ${message}`);
  }

  error(message: string): void {
    this.sink(`❌ ${message}`);
  }

  line(message: string): void {
    this.sink(message);
  }
}
