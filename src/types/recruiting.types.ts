export interface Job {
  id: number;
  title: string;
  description: string | null;
  requirements: string | null;
  location: string | null;
  salaryMin: number | null;
  salaryMax: number | null;
  status: string;
  postedAt: Date;
  employeeId: number | null;
}

export interface Curriculum {
  id: number;
  jobId: number;
  name: string;
  email: string;
  phone: string | null;
  curriculumPath: string | null;
  coverLetter: string | null;
  status: string;
  submittedAt: Date;
  employeeId: number | null;
}
