export {
  createTempDir,
  removeDir,
  readSampleDictionary,
  writeDictionary,
  withTempLexicon,
} from "./fs.js";
