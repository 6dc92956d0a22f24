export { DirectorySource, defaultLoaders } from "./directory-source";
export { PdfLoader } from "./pdf-loader";
export { TextLoader } from "./text-loader";
