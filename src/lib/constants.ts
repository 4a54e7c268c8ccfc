/**
 * Default configuration file looked up at the repository root.
 */
export const CONFIG_FILENAME = "modelcheck.yaml";

/**
 * Default library surface manifest, relative to the repository root.
 */
export const SURFACE_FILENAME = "model-surface.yaml";

/**
 * Library name used as the prefix of documented class references
 * (`.. autoclass:: <libraryName>.BertModel`).
 */
export const DEFAULT_LIBRARY_NAME = "transformers";

/**
 * File naming conventions for the test and documentation corpora.
 */
export const FileConventions = {
  /** Prepended to a module id to get its test file */
  testPrefix: "test_",
  /** Appended to a module id to get its test file */
  testSuffix: ".py",
  /** Appended to a family name to get its doc file */
  docExtension: ".rst",
} as const;

/**
 * Repository-relative directories scanned for coverage declarations.
 */
export const DefaultPaths = {
  tests: "tests",
  docs: "docs/source/model_doc",
} as const;

/**
 * Rules deciding which library members count as model modules and classes.
 */
export const ModelRules = {
  /** Module ids starting with this are model implementation modules */
  modulePrefix: "modeling",

  /** A class is a model when it descends from one of these */
  baseClasses: ["PreTrainedModel", "TFPreTrainedModel"],

  /** Names containing any of these are abstract bases, never audited */
  abstractMarkers: ["Pretrained", "PreTrained"],

  /** Shared and utility modules that carry no model family of their own */
  ignoreModules: [
    "modeling_auto",
    "modeling_encoder_decoder",
    "modeling_marian",
    "modeling_mmbt",
    "modeling_outputs",
    "modeling_retribert",
    "modeling_utils",
    "modeling_transfo_xl_utilities",
    "modeling_tf_auto",
    "modeling_tf_outputs",
    "modeling_tf_pytorch_utils",
    "modeling_tf_utils",
    "modeling_tf_transfo_xl_utilities",
  ],
} as const;

/**
 * Corpus files left out of discovery, by file name without extension.
 */
export const CorpusIgnores = {
  testFiles: [
    "test_modeling_common",
    "test_modeling_encoder_decoder",
    "test_modeling_marian",
    "test_modeling_mbart",
    "test_modeling_tf_common",
  ],
  docFiles: ["auto", "dialogpt", "marian", "retribert"],
} as const;

/**
 * Allow-lists for coverage gaps. Being listed here is an exception and
 * should not be the rule.
 */
export const DefaultExceptions = {
  ignoreNonTested: [
    "BertLMHeadModel", // needs to be set up as decoder
    "DPREncoder", // part of a bigger tested model
    "DPRSpanPredictor", // part of a bigger tested model
    "ReformerForMaskedLM", // needs to be set up as decoder
    "T5Stack", // part of a bigger tested model
    "TFAlbertForMultipleChoice",
    "TFAlbertForTokenClassification",
    "TFBertLMHeadModel",
    "TFElectraForMultipleChoice",
    "TFElectraForQuestionAnswering",
    "TFElectraForSequenceClassification",
    "TFElectraMainLayer", // part of a bigger tested model
    "TFRobertaForMultipleChoice",
  ],

  /** Test files without an `all_model_classes` tester */
  testFilesWithNoCommonTests: [
    "test_modeling_camembert.py",
    "test_modeling_tf_camembert.py",
    "test_modeling_tf_xlm_roberta.py",
    "test_modeling_xlm_roberta.py",
  ],

  ignoreNonDocumented: [
    "DPREncoder",
    "DPRSpanPredictor",
    "T5Stack",
    "TFElectraMainLayer",
  ],
} as const;

/**
 * Family names whose doc file does not follow `<family>.rst`.
 */
export const DEFAULT_MODEL_NAME_TO_DOC_FILE: Readonly<Record<string, string>> = {
  openai: "gpt.rst",
  transfo_xl: "transformerxl.rst",
  xlm_roberta: "xlmroberta.rst",
};
