import { err, ok } from "./errors.js";
import type { Result } from "./errors.js";
import type { IssueTemplate } from "./types.js";

/**
 * Name → template lookup. Registration returns a new registry and leaves
 * the receiver untouched, so a rejected duplicate keeps the first entry.
 */
export interface TemplateRegistry {
  readonly size: number;
  get: (name: string) => IssueTemplate | undefined;
  has: (name: string) => boolean;
  names: () => string[];
  register: (name: string, template: IssueTemplate) => Result<TemplateRegistry>;
}

function fromEntries(templates: ReadonlyMap<string, IssueTemplate>): TemplateRegistry {
  return Object.freeze({
    size: templates.size,

    get(name: string) {
      return templates.get(name);
    },

    has(name: string) {
      return templates.has(name);
    },

    names() {
      return [...templates.keys()];
    },

    register(name: string, template: IssueTemplate) {
      if (templates.has(name)) {
        return err({ kind: "DuplicateTemplateName", name });
      }
      return ok(fromEntries(new Map(templates).set(name, template)));
    },
  });
}

export function createTemplateRegistry(): TemplateRegistry {
  return fromEntries(new Map<string, IssueTemplate>());
}
