export * from "./FrameDescriptor";
export * from "./FrameNameFormat";
export * from "./FrameNameParser";
export * from "./FrameNameParserDefault";
