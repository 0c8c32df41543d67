export type SkillDefinition = {
  name: string;
  nameLower: string;
  description: string;
  sourcePath: string;
};

export type SkillCatalog = {
  directory: string;
  exists: boolean;
  skills: SkillDefinition[];
  errors: string[];
};

export type SkillMatch = {
  skill: SkillDefinition;
  score: number;
};
