// Category AST for slash-notation CG categories

export interface BaseCategory {
  type: 'base';
  /** Atomic label with feature brackets removed, e.g. `Sm` */
  label: string;
}

/** Backslash functor: looks for its antecedent on the left */
export interface LeftFunctor {
  type: 'left';
  antecedent: CategoryNode;
  consequence: CategoryNode;
}

/** Forward-slash functor: looks for its antecedent on the right */
export interface RightFunctor {
  type: 'right';
  antecedent: CategoryNode;
  consequence: CategoryNode;
}

export type CategoryNode = BaseCategory | LeftFunctor | RightFunctor;

export function baseCategory(label: string): BaseCategory {
  return { type: 'base', label };
}

export function leftFunctor(antecedent: CategoryNode, consequence: CategoryNode): LeftFunctor {
  return { type: 'left', antecedent, consequence };
}

export function rightFunctor(antecedent: CategoryNode, consequence: CategoryNode): RightFunctor {
  return { type: 'right', antecedent, consequence };
}
