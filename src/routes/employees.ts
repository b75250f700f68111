import { Router } from "express";
import type { Request, Response } from "express";
import multer from "multer";
import { z } from "zod";
import type { AppContainer } from "../container";
import { asyncHandler } from "../middleware/error-handler";
import { Department, EmployeeLevel } from "../types/interview";
import { NotFoundError, ValidationError } from "../utils/errors";

const MAX_RESUME_BYTES = 10 * 1024 * 1024;

const createEmployeeSchema = z.object({
    name: z.string().min(1),
    email: z.string().email(),
    position: z.string().min(1),
    department: z.nativeEnum(Department),
    level: z.nativeEnum(EmployeeLevel),
    experience_years: z.number().int().min(0).default(0),
    skills: z.array(z.string().min(1)).default([]),
    career_goals: z.array(z.string().min(1)).default([]),
    manager_id: z.string().uuid().nullable().optional(),
    hire_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD').nullable().optional(),
    salary: z.number().positive().nullable().optional()
});

const updateEmployeeSchema = createEmployeeSchema.partial();

const listEmployeesQuerySchema = z.object({
    email: z.string().email().optional(),
    min_level: z.nativeEnum(EmployeeLevel).optional(),
    max_level: z.nativeEnum(EmployeeLevel).optional(),
    department: z.nativeEnum(Department).optional(),
    level: z.nativeEnum(EmployeeLevel).optional(),
    manager_id: z.string().uuid().optional(),
    skills: z.string().optional(),
    limit: z.coerce.number().int().min(1).max(500).default(100),
    offset: z.coerce.number().int().min(0).default(0)
});

const performanceRatingSchema = z.object({
    rating: z.number().min(1).max(5),
    reviewer: z.string().min(1).optional(),
    notes: z.string().optional(),
    // Calendar day, so that string order is date order
    date: z.string().date().optional()
});

const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
        fileSize: MAX_RESUME_BYTES,
    },
    fileFilter: (req, file, cb) => {
        if (file.mimetype === 'application/pdf') {
            cb(null, true);
        } else {
            cb(new ValidationError('Only PDF files are allowed', { fields: ['resume'] }));
        }
    }
});

function employeeNotFound(id: string): NotFoundError {
    return new NotFoundError(`Employee ${id} not found`, { resourceType: 'Employee', resourceId: id });
}

function splitList(value: string | undefined): string[] {
    return (value ?? '').split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Employee routes
 *
 * CRUD plus the profile snapshot the agents see, performance ratings and
 * resume upload (skills extracted from the PDF are merged into the record).
 */
export function employeeRoutes({ repositories, directory, documents, logger }: AppContainer): Router {
    const router = Router();
    const { employees, interviews, evaluations } = repositories;

    router.post('/', asyncHandler(async (req: Request, res: Response) => {
        const body = createEmployeeSchema.parse(req.body);
        const employee = await employees.create(body);
        logger.info({ employeeId: employee.id }, 'Employee created');
        res.status(201).json(employee);
    }));

    /**
     * GET /employees
     *
     * One filter at a time, in this order: email, skills (comma separated,
     * any match), department (optionally with level), min_level/max_level
     * (inclusive, either end may be left open), manager_id. Without a filter
     * the list is paged with limit/offset.
     */
    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        const query = listEmployeesQuerySchema.parse(req.query);
        const skills = splitList(query.skills);

        if (query.email) {
            const employee = await employees.findByEmail(query.email);
            res.json(employee ? [employee] : []);
        } else if (skills.length > 0) {
            res.json(await employees.findBySkills(skills));
        } else if (query.department) {
            res.json(await employees.getTeamMembers(query.department, query.level));
        } else if (query.min_level || query.max_level) {
            res.json(await employees.findByLevelRange(
                query.min_level ?? EmployeeLevel.INTERN,
                query.max_level ?? EmployeeLevel.DIRECTOR
            ));
        } else if (query.manager_id) {
            res.json(await employees.findByManager(query.manager_id));
        } else {
            res.json(await employees.findAll(query.limit, query.offset));
        }
    }));

    router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
        const employee = await employees.findById(req.params.id);
        if (!employee) {
            throw employeeNotFound(req.params.id);
        }
        res.json(employee);
    }));

    router.get('/:id/profile', asyncHandler(async (req: Request, res: Response) => {
        const profile = await directory.getEmployeeProfile(req.params.id);
        if (!profile) {
            throw employeeNotFound(req.params.id);
        }
        res.json(profile);
    }));

    router.get('/:id/interviews', asyncHandler(async (req: Request, res: Response) => {
        if (!(await employees.exists(req.params.id))) {
            throw employeeNotFound(req.params.id);
        }
        res.json(await interviews.findByEmployee(req.params.id));
    }));

    router.get('/:id/evaluations', asyncHandler(async (req: Request, res: Response) => {
        if (!(await employees.exists(req.params.id))) {
            throw employeeNotFound(req.params.id);
        }
        res.json(await evaluations.findByEmployee(req.params.id));
    }));

    router.patch('/:id', asyncHandler(async (req: Request, res: Response) => {
        const changes = updateEmployeeSchema.parse(req.body);
        const employee = await employees.update(req.params.id, changes);
        if (!employee) {
            throw employeeNotFound(req.params.id);
        }
        res.json(employee);
    }));

    router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
        if (!(await employees.delete(req.params.id))) {
            throw employeeNotFound(req.params.id);
        }
        res.status(204).end();
    }));

    router.post('/:id/restore', asyncHandler(async (req: Request, res: Response) => {
        const employee = await employees.restore(req.params.id);
        if (!employee) {
            throw employeeNotFound(req.params.id);
        }
        res.json(employee);
    }));

    router.post('/:id/performance-ratings', asyncHandler(async (req: Request, res: Response) => {
        const rating = performanceRatingSchema.parse(req.body);
        const employee = await employees.addPerformanceRating(req.params.id, rating);
        if (!employee) {
            throw employeeNotFound(req.params.id);
        }
        res.status(201).json(employee);
    }));

    router.post('/:id/resume', upload.single('resume'), asyncHandler(async (req: Request, res: Response) => {
        if (!req.file) {
            throw new ValidationError('A PDF file is required in the "resume" field', { fields: ['resume'] });
        }

        const employee = await employees.findById(req.params.id);
        if (!employee) {
            throw employeeNotFound(req.params.id);
        }

        const extracted = await documents.extractResumeSkills(req.file.buffer);
        const merged = Array.from(new Set([...employee.skills, ...extracted]));
        const updated = await employees.updateSkills(employee.id, merged);

        logger.info({
            employeeId: employee.id,
            extracted: extracted.length,
            added: merged.length - employee.skills.length
        }, 'Resume processed');

        res.json({
            employee_id: employee.id,
            extracted_skills: extracted,
            skills: updated?.skills ?? merged
        });
    }));

    return router;
}
