/** A value_range entry or default_value as written in a definition file. */
export type DefinitionScalar = string | number;

export type MetricDefinitionEntry = {
  name: string;
  metric_type: string;
  desc?: string | null;
  value_range?: DefinitionScalar[] | null;
  default_value?: DefinitionScalar | null;
};

export type ProjectDefinitionEntry = {
  name: string;
  organization?: string | null;
  desc?: string | null;
  metrics?: MetricDefinitionEntry[];
};

/** Top-level shape of a YAML/JSON project definition file. */
export type ProjectDefinitionsDocument = {
  projects: ProjectDefinitionEntry[];
};
