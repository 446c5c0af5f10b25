export const SERVICE_NAME = "Document Summarization Service";
export const SERVICE_VERSION = "0.1.0";
