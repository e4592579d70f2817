import type { DiagnosticEvent, DiagnosticWriter, Severity } from "./types.js";

/** In-memory writer for tests and embedded use; keeps every event in arrival order. */
export class MemoryDiagnosticWriter implements DiagnosticWriter {
	private readonly store: DiagnosticEvent[] = [];

	write(event: DiagnosticEvent): void {
		this.store.push(event);
	}

	events(): readonly DiagnosticEvent[] {
		return this.store;
	}

	bySeverity(severity: Severity): readonly DiagnosticEvent[] {
		return this.store.filter((e) => e.severity === severity);
	}

	byComponent(component: string): readonly DiagnosticEvent[] {
		return this.store.filter((e) => e.component === component);
	}

	clear(): void {
		this.store.length = 0;
	}
}
