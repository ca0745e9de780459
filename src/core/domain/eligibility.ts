import type { EligibilityRules, FlatType, Person, Project } from "../ports";

export const DEFAULT_ELIGIBILITY_RULES: EligibilityRules = {
  singleMinAge: 35,
  singleFlatTypes: ["2-Room"],
  marriedMinAge: 21,
  marriedFlatTypes: ["2-Room", "3-Room"],
};

/**
 * Flat types a person may apply for. An empty set means the person is not
 * eligible for any project.
 */
export function eligibleFlatTypes(
  person: Pick<Person, "age" | "maritalStatus">,
  rules: EligibilityRules = DEFAULT_ELIGIBILITY_RULES,
): ReadonlySet<FlatType> {
  if (person.maritalStatus === "single") {
    return person.age < rules.singleMinAge ? new Set() : new Set(rules.singleFlatTypes);
  }
  return person.age < rules.marriedMinAge ? new Set() : new Set(rules.marriedFlatTypes);
}

// A project is shown to a person when it is visible and still has units in a flat type they may take
export function isProjectOpenTo(
  person: Pick<Person, "age" | "maritalStatus">,
  project: Project,
  rules: EligibilityRules = DEFAULT_ELIGIBILITY_RULES,
): boolean {
  if (!project.visible) {
    return false;
  }
  for (const flatType of eligibleFlatTypes(person, rules)) {
    const inventory = project.flatTypes[flatType];
    if (inventory && inventory.units > 0) {
      return true;
    }
  }
  return false;
}

// Formats a Date as the local calendar day, matching how project windows are stored
export function toIsoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

// Windows are inclusive on both ends; a missing open or close date leaves the project unrestricted
export function isWithinApplicationWindow(project: Project, today: Date): boolean {
  if (!project.openDate || !project.closeDate) {
    return true;
  }
  const day = toIsoDate(today);
  return project.openDate <= day && day <= project.closeDate;
}
