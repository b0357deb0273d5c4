import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  setup: async () => {},
  make: () =>
    new EnvSource({
      prefix: "ROTOLOG_",
      env: { ROTOLOG_MAX_FILES: "3", ROTOLOG_ASYNC: "true", HOME: "/home/test" },
    }),
  expected: { MAX_FILES: "3", ASYNC: "true" },
})
