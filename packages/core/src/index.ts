export * from "./errors";
export * from "./logger";
export * from "./metrics/metrics";

export * from "./config/defaults";
export * from "./config/engine";

export * from "./db/pool";
export * from "./db/migrate";
export * from "./repos/videos";
export * from "./repos/chunks";
export * from "./repos/embeddings";

export * from "./text/normalize";
export * from "./text/segment";
export * from "./subtitles/parse";
export * from "./subtitles/source";
export * from "./frames/sample";
export * from "./media/ffmpeg";
export * from "./media/store";

export * from "./embeddings/ollama";
export * from "./embeddings/openai";
export * from "./embeddings/provider";
export * from "./embeddings/cache";

export * from "./vector/types";
export * from "./vector/memory";
export * from "./vector/pg";

export * from "./indexing/indexer";
export * from "./indexing/ingest";
export * from "./search/retrieve";

export * from "./clips/fingerprint";
export * from "./clips/cache";
export * from "./clips/synthesize";

export * from "./llm/ollama";
export * from "./llm/openai";
export * from "./llm/generator";
export * from "./chat/compose";

export * from "./query/engine";
export * from "./query/factory";

export * from "./util/abort";
export * from "./util/retry";
