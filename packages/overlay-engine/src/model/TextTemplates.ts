import { isGroupHandle, type IRenderSurface, type PrimitiveHandle, type SceneHandle } from "@hudlink/rendering-core";
import { formatTemplate } from "./template.js";
import { hasAnimateFlag, type ModelValue } from "./textModel.js";

/**
 * Template source of every text primitive drawn by the engine. Entries go away with
 * their handles.
 */
export class TextTemplates {
  private templates = new WeakMap<PrimitiveHandle, string>();

  remember(handle: PrimitiveHandle, source: string): void {
    this.templates.set(handle, source);
  }

  templateOf(handle: PrimitiveHandle): string | undefined {
    return this.templates.get(handle);
  }

  /**
   * Re-renders every templated text under `root` against `model`. Texts whose output
   * changed are updated and, when the model asks for it, animated. Returns how many
   * texts changed.
   */
  refresh(surface: IRenderSurface, root: SceneHandle, model: ModelValue): number {
    const animate = hasAnimateFlag(model);
    let changed = 0;

    const visit = (handle: SceneHandle): void => {
      if (isGroupHandle(handle)) {
        for (const child of surface.childrenOf(handle)) visit(child);
        return;
      }
      if (handle.kind !== "text") return;

      const source = this.templates.get(handle);
      if (!source) return;

      const text = formatTemplate(source, model);
      if (surface.textOf(handle) === text) return;

      surface.setText(handle, text);
      if (animate) surface.animateText(handle);
      changed++;
    };

    visit(root);
    return changed;
  }
}
