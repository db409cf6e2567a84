export {
  usedSequences,
  proposeSlots,
  confirmSlot,
  type SlotKind,
  type SlotCandidate,
  type SlotProposal,
} from "./slots.js";
