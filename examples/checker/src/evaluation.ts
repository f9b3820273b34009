import { Check, ReportBase } from "@policy-report/core";

export class Evaluation extends ReportBase {
  @Check("policy_1")
  checkNumber1(): boolean {
    return false;
  }

  @Check("policy_2")
  checkNumber2(): boolean {
    return true;
  }

  @Check("policy_3")
  checkNumber3(): boolean {
    throw new RangeError("No value");
  }

  @Check("policy_4")
  checkNumber4(): boolean {
    return true;
  }
}
