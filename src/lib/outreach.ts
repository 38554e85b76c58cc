import type { CompanyRecord, EngineeringLeader } from "./types.js";

export interface OutreachMessage {
  leader: EngineeringLeader;
  message: string;
}

function firstName(fullName: string | null): string {
  const first = fullName?.trim().split(/\s+/)[0];
  if (!first) return "there";
  return first.charAt(0).toUpperCase() + first.slice(1);
}

export function personalizedMessage(
  company: CompanyRecord,
  leader: EngineeringLeader,
  engineeringPercentage: number,
): string {
  const companyName = company.name ?? "your company";
  const role = leader.title ? ` as ${leader.title}` : "";
  const share =
    engineeringPercentage > 0
      ? `engineers make up about ${engineeringPercentage}% of ${companyName}`
      : `${companyName} is growing its engineering team`;

  return (
    `Hi ${firstName(leader.name)},\n\n` +
    `I noticed ${share}. Scaling a team like that${role} usually means hiring is never far from your mind. ` +
    `Would you be open to a short call about how we help engineering leaders find strong candidates faster?`
  );
}

export function buildOutreach(
  company: CompanyRecord,
  leaders: EngineeringLeader[],
  engineeringPercentage: number,
): OutreachMessage[] {
  return leaders.map((leader) => ({ leader, message: personalizedMessage(company, leader, engineeringPercentage) }));
}
