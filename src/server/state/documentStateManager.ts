import { JobRegistry } from "../job/jobRegistry";

/**
 * Owns one job registry per open document.
 */
export class DocumentStateManager {
	private readonly registryByUri = new Map<string, JobRegistry>();

	/**
	 * Registry of a document, created on first use.
	 */
	registryFor(uri: string): JobRegistry {
		let registry = this.registryByUri.get(uri);
		if (!registry) {
			registry = new JobRegistry();
			this.registryByUri.set(uri, registry);
		}
		return registry;
	}

	/**
	 * Registry of a document, if it has one. Never creates a registry.
	 */
	getRegistry(uri: string): JobRegistry | undefined {
		return this.registryByUri.get(uri);
	}

	hasRegistry(uri: string): boolean {
		return this.registryByUri.has(uri);
	}

	/**
	 * Cancel every job of a document and drop its registry.
	 * Completion handlers still running find their jobs obsolete.
	 */
	releaseDocument(uri: string): void {
		const registry = this.registryByUri.get(uri);
		if (registry) {
			registry.cancelAll();
			this.registryByUri.delete(uri);
		}
	}

	releaseAll(): void {
		for (const uri of [...this.registryByUri.keys()]) {
			this.releaseDocument(uri);
		}
	}
}
