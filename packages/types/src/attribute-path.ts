export type PathStep =
  | { type: "attribute"; name: string }
  | { type: "key"; key: string }
  | { type: "index"; index: number };

/**
 * Immutable location inside a value tree.
 * Rendered as `spec.template.containers[0].env["HOME"]`.
 */
export class AttributePath {
  static readonly root = new AttributePath([]);

  readonly steps: readonly PathStep[];

  private constructor(steps: readonly PathStep[]) {
    this.steps = steps;
  }

  static of(...names: string[]): AttributePath {
    return new AttributePath(names.map((name) => ({ type: "attribute", name })));
  }

  get isRoot(): boolean {
    return this.steps.length === 0;
  }

  withAttribute(name: string): AttributePath {
    return new AttributePath([...this.steps, { type: "attribute", name }]);
  }

  withKey(key: string): AttributePath {
    return new AttributePath([...this.steps, { type: "key", key }]);
  }

  withIndex(index: number): AttributePath {
    return new AttributePath([...this.steps, { type: "index", index }]);
  }

  toString(): string {
    let rendered = "";
    for (const step of this.steps) {
      switch (step.type) {
        case "attribute":
          rendered = rendered.length === 0 ? step.name : `${rendered}.${step.name}`;
          break;
        case "key":
          rendered += `[${JSON.stringify(step.key)}]`;
          break;
        case "index":
          rendered += `[${step.index}]`;
          break;
      }
    }
    return rendered;
  }
}
