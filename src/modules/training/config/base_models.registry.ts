/**
 * Approved base model registry.
 *
 * Submission is refused for any id not listed here with approved=true.
 */

export interface BaseModelEntry {
  id: string;
  license: string;
  paramsBillions: number;
  intendedUse: 'instruction' | 'chat';
  approved: boolean;
}

export const BASE_MODELS: readonly BaseModelEntry[] = [
  {
    id: 'mistralai/Mistral-7B-Instruct-v0.3',
    license: 'Apache-2.0',
    paramsBillions: 7.2,
    intendedUse: 'instruction',
    approved: true,
  },
  {
    id: 'meta-llama/Llama-3.1-8B-Instruct',
    license: 'Llama 3.1 Community License',
    paramsBillions: 8,
    intendedUse: 'chat',
    approved: true,
  },
  {
    id: 'Qwen/Qwen2.5-7B-Instruct',
    license: 'Apache-2.0',
    paramsBillions: 7.6,
    intendedUse: 'chat',
    approved: true,
  },
];

export class BaseModelRegistry {
  private readonly byId: Map<string, BaseModelEntry>;

  constructor(entries: readonly BaseModelEntry[] = BASE_MODELS) {
    this.byId = new Map(entries.map((e) => [e.id, e]));
  }

  get(id: string): BaseModelEntry | null {
    return this.byId.get(id) ?? null;
  }

  isApproved(id: string): boolean {
    return this.byId.get(id)?.approved === true;
  }

  list(): BaseModelEntry[] {
    return Array.from(this.byId.values());
  }
}
