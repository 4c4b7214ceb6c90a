import { Deque } from "../deque"
import { runSequenceContractTests } from "./sequence.contract"

describe("Deque", () => {
  runSequenceContractTests("Deque", (values) => new Deque(values))
})
