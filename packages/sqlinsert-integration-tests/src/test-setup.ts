import { use } from "chai";
import chaiAsPromised from "chai-as-promised";
import { resetDefaultConfig } from "sqlinsert";

// Setup chai-as-promised for async assertions
use(chaiAsPromised);

// Library loggers stay quiet unless VERBOSE_TESTS=true
if (process.env.VERBOSE_TESTS !== "true") {
  process.env.LOG_LEVEL = "silent";
}

// Suites that change the process-wide default must not leak it
afterEach(function () {
  resetDefaultConfig();
});
