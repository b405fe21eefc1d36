import { greet, countVisit, describeVersion } from "./counter.controller";

const counterController = {
    greet,
    countVisit,
}

const versionController = {
    greet,
    describeVersion,
}

export { counterController, versionController }
