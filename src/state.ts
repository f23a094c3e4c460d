let isInCLI = false;

export function getIsRunningFromCLI() {
    return isInCLI;
}

export function setIsRunningFromCLI(value: boolean) {
    isInCLI = value;
}
