// Call in beforeEach so generated case names start over in every test
let testCaseCounter = 0;

export function resetFactories(): void {
  testCaseCounter = 0;
}

export function getNextTestCaseId(): number {
  return ++testCaseCounter;
}
