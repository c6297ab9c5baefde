export type SubjectId = number;

// WaniKani subject object types; "vocabulary" is the only one we surface.
export type SubjectKind = "radical" | "kanji" | "vocabulary" | "kana_vocabulary" | (string & {});

export type SubjectRecord = {
  readonly id: SubjectId;
  readonly kind: SubjectKind;
  readonly slug: string;
};

export type VocabTerm = string;

export type GenerationFragment = {
  text: string;
  isThought: boolean;
};

export type RenderState = {
  answerBuffer: string;
  thoughtBuffer: string;
  foldedOnce: boolean;
};
