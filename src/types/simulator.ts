export type AttrValue = number | null;

export interface ModelMeta {
  public: boolean;
  params: string[];
  attrs: string[];
}

export interface SimulatorMeta {
  apiVersion: string;
  models: Record<string, ModelMeta>;
}

export interface EntityDescriptor {
  eid: string;
  type: string;
}

/** eid -> attr -> source eid -> value */
export type StepInputs = Record<string, Record<string, Record<string, AttrValue>>>;

/** eid -> requested attrs */
export type OutputRequest = Record<string, string[]>;

/** eid -> attr -> value */
export type OutputData = Record<string, Record<string, AttrValue>>;

/** source eid -> destination eid -> attr -> value */
export type SetData = Record<string, Record<string, Record<string, AttrValue>>>;
