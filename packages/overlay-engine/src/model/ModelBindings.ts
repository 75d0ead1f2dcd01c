import type { ModelValue } from "./textModel.js";

/** At most one model per group name; binding again replaces. */
export class ModelBindings {
  private models = new Map<string, ModelValue>();

  bind(name: string, model: ModelValue): void {
    this.models.set(name, model);
  }

  get(name: string): ModelValue | undefined {
    return this.models.get(name);
  }

  has(name: string): boolean {
    return this.models.has(name);
  }

  clear(): void {
    this.models.clear();
  }
}
