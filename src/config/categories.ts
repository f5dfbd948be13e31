import { CategoryId } from '../types/quiz';

export interface CategoryDetails {
  fullName: string;
  // Short label used in prompts, chart axes and template headings.
  label: string;
  description: string;
}

export const CATEGORY_DETAILS: Record<CategoryId, CategoryDetails> = {
  RedTeam: {
    fullName: 'Red Team (Offensive)',
    label: 'Red Team',
    description:
      'You\'re drawn to offensive security! Red Team professionals simulate attacks, find vulnerabilities, and ' +
      'think like adversaries. Perfect for penetration testing, ethical hacking, and security research.'
  },
  BlueTeam: {
    fullName: 'Blue Team (Defensive)',
    label: 'Blue Team',
    description:
      'You excel at defensive security! Blue Team professionals build and maintain security infrastructure, ' +
      'monitor threats, and respond to incidents. Ideal for SOC analysts, security engineers, and incident responders.'
  },
  AppSec: {
    fullName: 'Application Security',
    label: 'AppSec',
    description:
      'You\'re passionate about secure code! AppSec professionals review code, find vulnerabilities, and ensure ' +
      'applications are built securely. Great for security engineers, code reviewers, and DevSecOps roles.'
  },
  GRC: {
    fullName: 'GRC (Governance, Risk & Compliance)',
    label: 'GRC',
    description:
      'You understand the big picture! GRC professionals ensure organizations meet compliance standards, manage ' +
      'risk, and develop security policies. Perfect for compliance officers, risk analysts, and security auditors.'
  },
  CloudSecurity: {
    fullName: 'Cloud Security',
    label: 'Cloud Security',
    description:
      'You\'re focused on cloud infrastructure! Cloud Security professionals secure cloud environments, configure ' +
      'security controls, and manage cloud-based security solutions. Ideal for cloud security engineers and architects.'
  }
};

export const DEFAULT_CATEGORY_DESCRIPTION = 'Explore this domain to learn more about your career path!';

export const describeCategory = (fullName: string): string => {
  const match = Object.values(CATEGORY_DETAILS).find((d) => d.fullName === fullName);
  return match ? match.description : DEFAULT_CATEGORY_DESCRIPTION;
};
