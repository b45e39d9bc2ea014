import { describeFileTreeContract } from "../../../ports/__tests__/file-tree.contract"
import { nodeFileTreeHarness } from "./node-file-tree-harness"

describeFileTreeContract(nodeFileTreeHarness())
