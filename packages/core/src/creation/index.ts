export {
  CreationSessionSchema,
  listCreationCategories,
  startCreation,
  chooseSlot,
  prepareCreation,
  type CreationSession,
  type CategoryChoice,
  type CreationRequest,
} from "./session.js";
export {
  commitCreation,
  fsFolderCreator,
  type FolderCreator,
  type CommitOptions,
  type CommitResult,
} from "./commit.js";
